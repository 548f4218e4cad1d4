import { OrderStatus } from './order.entity';

export enum OrderEvent {
  CHECKOUT = 'checkout',
  PAY = 'pay',
  CANCEL = 'cancel',
}

type TransitionTable = Readonly<
  Record<OrderStatus, Readonly<Partial<Record<OrderEvent, OrderStatus>>>>
>;

/**
 * Every legal order transition. Anything missing here is rejected.
 *
 *   OPEN --checkout--> CHECKOUT --pay----> PAID
 *                              \--cancel-> CANCELLED
 */
export const ORDER_TRANSITIONS: TransitionTable = {
  [OrderStatus.OPEN]: { [OrderEvent.CHECKOUT]: OrderStatus.CHECKOUT },
  [OrderStatus.CHECKOUT]: {
    [OrderEvent.PAY]: OrderStatus.PAID,
    [OrderEvent.CANCEL]: OrderStatus.CANCELLED,
  },
  [OrderStatus.PAID]: {},
  [OrderStatus.CANCELLED]: {},
};

export class InvalidOrderTransitionError extends Error {
  constructor(
    readonly from: OrderStatus,
    readonly event: OrderEvent,
  ) {
    super(`Cannot ${event} an order in status ${from}`);
    this.name = 'InvalidOrderTransitionError';
  }
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return Object.keys(ORDER_TRANSITIONS[status]).length === 0;
}

export function canTransition(from: OrderStatus, event: OrderEvent): boolean {
  return ORDER_TRANSITIONS[from][event] !== undefined;
}

export function nextOrderStatus(
  from: OrderStatus,
  event: OrderEvent,
): OrderStatus {
  const to = ORDER_TRANSITIONS[from][event];
  if (to === undefined) throw new InvalidOrderTransitionError(from, event);
  return to;
}
