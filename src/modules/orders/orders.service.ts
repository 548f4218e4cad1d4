import {
  ConflictException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';

import { Order, OrderStatus } from './order.entity';
import { OrderLine } from './order-line.entity';
import {
  InvalidOrderTransitionError,
  OrderEvent,
  isTerminalStatus,
  nextOrderStatus,
} from './order-state-machine';
import { computeOrderTotal } from './order-totals';
import {
  PG_UNIQUE_VIOLATION,
  getPgErrorCode,
} from '../../common/pg-errors';

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @InjectRepository(Order)
    private readonly orderRepo: Repository<Order>,

    @InjectRepository(OrderLine)
    private readonly lineRepo: Repository<OrderLine>,
  ) {}

  private orders(manager?: EntityManager): Repository<Order> {
    return manager ? manager.getRepository(Order) : this.orderRepo;
  }

  private lines(manager?: EntityManager): Repository<OrderLine> {
    return manager ? manager.getRepository(OrderLine) : this.lineRepo;
  }

  /** The customer's cart. `lock` takes a row lock and needs a transaction manager. */
  getOpenOrderForCustomer(
    customerId: string,
    manager?: EntityManager,
    options: { lock?: boolean } = {},
  ): Promise<Order | null> {
    return this.orders(manager).findOne({
      where: { customerId, status: OrderStatus.OPEN },
      lock: options.lock ? { mode: 'pessimistic_write' } : undefined,
    });
  }

  /**
   * Row lock on the order by id. A writer that committed first is seen here,
   * so the caller's guarded update against the version it read beforehand
   * reports the conflict. Null when the order was deleted meanwhile.
   */
  lockOrder(orderId: string, manager: EntityManager): Promise<Order | null> {
    return this.orders(manager).findOne({
      where: { id: orderId },
      lock: { mode: 'pessimistic_write' },
    });
  }

  getOrderLines(orderId: string, manager?: EntityManager): Promise<OrderLine[]> {
    return this.lines(manager).find({
      where: { orderId },
      relations: { product: true },
      order: { createdAt: 'ASC' },
    });
  }

  /**
   * Starts a new cart. The partial unique index allows one OPEN order per
   * customer; losing that race surfaces as a conflict.
   */
  async createOpenOrder(
    customerId: string,
    manager?: EntityManager,
  ): Promise<Order> {
    const repo = this.orders(manager);
    try {
      const order = await repo.save(
        repo.create({ customerId, status: OrderStatus.OPEN }),
      );
      this.logger.log(`cart created orderId=${order.id} customerId=${customerId}`);
      return order;
    } catch (e: unknown) {
      if (getPgErrorCode(e) === PG_UNIQUE_VIOLATION) {
        throw new ConflictException('Customer already has an active cart');
      }
      throw e;
    }
  }

  /** Deletes an OPEN order; its lines go with it. */
  async deleteOpenOrder(order: Order, manager?: EntityManager): Promise<void> {
    if (order.status !== OrderStatus.OPEN) {
      throw new ConflictException('Only an open cart can be deleted');
    }
    await this.orders(manager).delete({ id: order.id, status: OrderStatus.OPEN });
    this.logger.log(`cart deleted orderId=${order.id} customerId=${order.customerId}`);
  }

  async computeOrderTotal(
    orderId: string,
    manager?: EntityManager,
  ): Promise<number> {
    return computeOrderTotal(await this.getOrderLines(orderId, manager));
  }

  /**
   * Applies `event` to `order` through a conditional UPDATE that only matches
   * the status and version the caller read. A concurrent writer makes it
   * match nothing, which is reported as a conflict.
   */
  async transitionOrder(
    order: Order,
    event: OrderEvent,
    manager?: EntityManager,
    conflictMessage = `Order ${order.id} was modified concurrently`,
  ): Promise<Order> {
    const to = this.resolveTransition(() => nextOrderStatus(order.status, event));
    const finalizedAt = isTerminalStatus(to) ? new Date() : null;

    const result = await this.orders(manager).update(
      { id: order.id, status: order.status, version: order.version },
      { status: to, finalizedAt },
    );
    if (!result.affected) throw new ConflictException(conflictMessage);

    this.logger.log(
      `order transition orderId=${order.id} from=${order.status} to=${to} event=${event}`,
    );

    return {
      ...order,
      status: to,
      version: order.version + 1,
      finalizedAt,
    };
  }

  /** Loads the order and applies `event` to it. */
  async setOrderStatus(
    orderId: string,
    event: OrderEvent,
    manager?: EntityManager,
  ): Promise<Order> {
    const order = await this.orders(manager).findOne({ where: { id: orderId } });
    if (!order) throw new NotFoundException('Order not found');
    return this.transitionOrder(order, event, manager);
  }

  listForCustomer(customerId: string): Promise<Order[]> {
    return this.orderRepo.find({
      where: { customerId },
      relations: { lines: true },
      order: { createdAt: 'DESC' },
    });
  }

  /** Settled orders only: PAID and CANCELLED. */
  listHistory(customerId: string): Promise<Order[]> {
    return this.orderRepo.find({
      where: {
        customerId,
        status: In([OrderStatus.PAID, OrderStatus.CANCELLED]),
      },
      relations: { lines: true },
      order: { createdAt: 'DESC' },
    });
  }

  async getOrderForCustomer(
    orderId: string,
    customerId: string,
  ): Promise<Order> {
    const order = await this.orderRepo.findOne({
      where: { id: orderId },
      relations: { lines: { product: true } },
    });
    if (!order) throw new NotFoundException('Order not found');
    if (order.customerId !== customerId) {
      throw new ForbiddenException('You can only access your own orders');
    }
    return order;
  }

  private resolveTransition<T>(resolve: () => T): T {
    try {
      return resolve();
    } catch (err) {
      if (err instanceof InvalidOrderTransitionError) {
        throw new ConflictException(err.message);
      }
      throw err;
    }
  }
}
