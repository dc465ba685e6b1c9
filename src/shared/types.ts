export const ROLES = ['superadmin', 'admin', 'frontdesk', 'kitchen', 'delivery'] as const;

export type Role = (typeof ROLES)[number];

export interface AccessTokenPayload {
  sub: string;
  username: string;
  role: Role;
  sid: string; // session id
  jti: string;
  token_type: 'access';
  iss: string;
  aud: string;
  exp: number;
  iat: number;
}

export interface Session {
  id: string;
  userId: string;
  role: Role; // Fixed for the session lifetime - a refresh never changes it
  refreshToken: string;
  expiresAt: number; // Unix timestamp (ms)
  revoked: boolean;
  createdAt: number;
}

export interface User {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: Role;
  isActive: boolean;
  passwordHash: string;
  lastLogin: Date | null;
  dateJoined: Date;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export interface AuthContext {
  sub: string;
  username: string;
  role: Role;
  sessionId: string;
  jti: string;
}

// Request-scoped result of the token lifetime inspection
export interface TokenLifetimeContext {
  expiresAt: number; // Unix epoch seconds
  remainingSeconds: number;
  warning: boolean;
}

export interface DeliveryLocation {
  name: string;
  fee: number;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export type DeliveryType = 'Pickup' | 'Delivery';

export type OrderStatus = 'Pending' | 'Confirmed' | 'Processing' | 'Ready' | 'Delivered' | 'Cancelled';

export interface Order {
  id: string;
  orderNumber: string;
  customerPhone: string;
  deliveryType: DeliveryType;
  deliveryLocation: string | null;
  items: OrderItem[];
  deliveryFee: number;
  totalPrice: number; // item subtotals + delivery fee
  status: OrderStatus;
  assignment: DeliveryAssignment | null;
  notes: string;
  createdBy: string;
  createdAt: string;
  updatedAt: string;
}

export interface MenuItem {
  id: string;
  name: string;
  description: string;
  price: number;
  isAvailable: boolean;
  createdBy: string;
  createdAt: string;
  updatedAt: string;
}

// Name and price are copied at order time so later menu edits leave the order alone
export interface OrderItem {
  menuItemId: string;
  name: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
}

export const ASSIGNMENT_STATUSES = ['assigned', 'picked_up', 'in_transit', 'delivered', 'returned', 'cancelled'] as const;

export type AssignmentStatus = (typeof ASSIGNMENT_STATUSES)[number];

export interface DeliveryAssignment {
  riderId: string;
  riderUsername: string;
  status: AssignmentStatus;
  assignedAt: string;
  pickedUpAt: string | null;
  deliveredAt: string | null;
}
