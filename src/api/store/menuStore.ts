import { v4 as uuidv4 } from 'uuid';
import { getNow } from '../../shared/clock';
import { MenuItem } from '../../shared/types';

export class MenuItemNameTakenError extends Error {
  constructor(name: string) {
    super(`Menu item name already taken: ${name}`);
    this.name = 'MenuItemNameTakenError';
  }
}

export interface NewMenuItem {
  name: string;
  description: string;
  price: number;
  isAvailable: boolean;
  createdBy: string;
}

export type MenuItemChanges = Partial<Pick<MenuItem, 'name' | 'description' | 'price' | 'isAvailable'>>;

export interface MenuStore {
  list(): Promise<MenuItem[]>;
  listAvailable(): Promise<MenuItem[]>;
  getById(id: string): Promise<MenuItem | null>;
  create(data: NewMenuItem): Promise<MenuItem>;
  update(id: string, changes: MenuItemChanges): Promise<MenuItem | null>;
  reset(): void;
}

function sameName(a: string, b: string): boolean {
  return a.localeCompare(b, undefined, { sensitivity: 'accent' }) === 0;
}

class InMemoryMenuStore implements MenuStore {
  private items = new Map<string, MenuItem>();

  async list(): Promise<MenuItem[]> {
    return [...this.items.values()].map(i => ({ ...i })).sort((a, b) => a.name.localeCompare(b.name));
  }

  async listAvailable(): Promise<MenuItem[]> {
    return (await this.list()).filter(i => i.isAvailable);
  }

  async getById(id: string): Promise<MenuItem | null> {
    const item = this.items.get(id);
    return item ? { ...item } : null;
  }

  private nameTaken(name: string, exceptId?: string): boolean {
    for (const item of this.items.values()) {
      if (item.id !== exceptId && sameName(item.name, name)) {
        return true;
      }
    }
    return false;
  }

  async create(data: NewMenuItem): Promise<MenuItem> {
    if (this.nameTaken(data.name)) {
      throw new MenuItemNameTakenError(data.name);
    }

    const now = getNow().toISOString();
    const item: MenuItem = { id: uuidv4(), ...data, createdAt: now, updatedAt: now };
    this.items.set(item.id, item);
    return { ...item };
  }

  async update(id: string, changes: MenuItemChanges): Promise<MenuItem | null> {
    const item = this.items.get(id);
    if (!item) return null;

    if (changes.name !== undefined && this.nameTaken(changes.name, id)) {
      throw new MenuItemNameTakenError(changes.name);
    }

    Object.assign(item, changes, { updatedAt: getNow().toISOString() });
    return { ...item };
  }

  reset(): void {
    this.items.clear();
  }
}

// Export singleton instance
export const menuStore: MenuStore = new InMemoryMenuStore();
