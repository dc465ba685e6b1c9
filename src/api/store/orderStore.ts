import { v4 as uuidv4 } from 'uuid';
import { getNow } from '../../shared/clock';
import { AssignmentStatus, DeliveryAssignment, DeliveryType, Order, OrderItem, OrderStatus } from '../../shared/types';

// Assignments a rider is still working on
export const ACTIVE_ASSIGNMENT_STATUSES: readonly AssignmentStatus[] = ['assigned', 'picked_up', 'in_transit'];

export interface NewOrder {
  customerPhone: string;
  deliveryType: DeliveryType;
  deliveryLocation: string | null;
  deliveryFee: number;
  items: OrderItem[];
  notes: string;
  createdBy: string;
}

export interface OrderChanges {
  status?: OrderStatus;
  assignment?: DeliveryAssignment | null;
}

export interface OrderStore {
  list(): Promise<Order[]>;
  getById(id: string): Promise<Order | null>;
  create(data: NewOrder): Promise<Order>;
  update(id: string, changes: OrderChanges): Promise<Order | null>;
  countActiveAssignments(riderId: string): Promise<number>;
  reset(): void;
}

export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function orderTotal(items: readonly OrderItem[], deliveryFee: number): number {
  return roundMoney(items.reduce((sum, item) => sum + item.subtotal, 0) + deliveryFee);
}

// YYMMDD in UTC
function dayStamp(date: Date): string {
  return date.toISOString().slice(2, 10).replace(/-/g, '');
}

function copyOrder(order: Order): Order {
  return {
    ...order,
    items: order.items.map(item => ({ ...item })),
    assignment: order.assignment ? { ...order.assignment } : null,
  };
}

class InMemoryOrderStore implements OrderStore {
  private orders = new Map<string, Order>();
  private dailySequence = new Map<string, number>();

  async list(): Promise<Order[]> {
    return [...this.orders.values()].reverse().map(copyOrder);
  }

  async getById(id: string): Promise<Order | null> {
    const order = this.orders.get(id);
    return order ? copyOrder(order) : null;
  }

  async create(data: NewOrder): Promise<Order> {
    const now = getNow();
    const day = dayStamp(now);
    const sequence = (this.dailySequence.get(day) ?? 0) + 1;
    this.dailySequence.set(day, sequence);

    const order: Order = {
      id: uuidv4(),
      orderNumber: `${day}-${String(sequence).padStart(3, '0')}`,
      ...data,
      totalPrice: orderTotal(data.items, data.deliveryFee),
      status: 'Pending',
      assignment: null,
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    };
    this.orders.set(order.id, order);
    return copyOrder(order);
  }

  async update(id: string, changes: OrderChanges): Promise<Order | null> {
    const order = this.orders.get(id);
    if (!order) return null;

    if (changes.status !== undefined) order.status = changes.status;
    if (changes.assignment !== undefined) order.assignment = changes.assignment;
    order.updatedAt = getNow().toISOString();
    return copyOrder(order);
  }

  async countActiveAssignments(riderId: string): Promise<number> {
    let count = 0;
    for (const order of this.orders.values()) {
      const assignment = order.assignment;
      if (assignment && assignment.riderId === riderId && ACTIVE_ASSIGNMENT_STATUSES.includes(assignment.status)) {
        count++;
      }
    }
    return count;
  }

  reset(): void {
    this.orders.clear();
    this.dailySequence.clear();
  }
}

// Export singleton instance
export const orderStore: OrderStore = new InMemoryOrderStore();
