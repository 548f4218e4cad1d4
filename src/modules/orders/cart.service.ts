import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';

import { Order } from './order.entity';
import { OrderLine } from './order-line.entity';
import { OrdersService } from './orders.service';
import { computeOrderTotal, countItems, lineTotal } from './order-totals';
import { CustomersService } from '../customers/customers.service';
import { Product } from '../products/product.entity';
import { ProductsService } from '../products/products.service';

export type CartLineView = {
  productKey: string | null;
  productName: string | null;
  quantity: number;
  unitPrice: number;
  discountPercent: number;
  lineTotal: number;
};

export type CartView = {
  orderId: string | null;
  lines: CartLineView[];
  totalItems: number;
  total: number;
};

function emptyCart(): CartView {
  return { orderId: null, lines: [], totalItems: 0, total: 0 };
}

/**
 * Mutations of the customer's OPEN order. Every write runs in a transaction
 * holding a row lock on the cart, so it serializes with checkout.
 */
@Injectable()
export class CartService {
  private readonly logger = new Logger(CartService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly orders: OrdersService,
    private readonly products: ProductsService,
    private readonly customers: CustomersService,
  ) {}

  async getCart(customerId: string): Promise<CartView> {
    await this.customers.getById(customerId);

    const order = await this.orders.getOpenOrderForCustomer(customerId);
    if (!order) return emptyCart();
    return this.toView(order.id, await this.orders.getOrderLines(order.id));
  }

  async addItem(
    customerId: string,
    productKey: string,
    quantity = 1,
  ): Promise<CartView> {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new BadRequestException('Quantity must be a positive integer');
    }
    await this.customers.getById(customerId);

    return this.dataSource.transaction(async (manager) => {
      const product = await this.products.getActiveByKey(productKey, manager);
      const order =
        (await this.orders.getOpenOrderForCustomer(customerId, manager, {
          lock: true,
        })) ?? (await this.orders.createOpenOrder(customerId, manager));

      const lineRepo = manager.getRepository(OrderLine);
      const existing = await lineRepo.findOne({
        where: { orderId: order.id, productId: product.id },
      });
      const quantityAfter = (existing?.quantity ?? 0) + quantity;
      this.assertInStock(product, quantityAfter);

      if (existing) {
        existing.quantity = quantityAfter;
        await lineRepo.save(existing);
      } else {
        await lineRepo.save(
          lineRepo.create({
            orderId: order.id,
            productId: product.id,
            quantity,
            unitPrice: product.price,
            discountPercent: product.discountPercent,
          }),
        );
      }

      this.logger.log(
        `cart item added orderId=${order.id} product=${product.key} quantity=${quantityAfter}`,
      );
      return this.toView(
        order.id,
        await this.orders.getOrderLines(order.id, manager),
      );
    });
  }

  /** Sets the line's quantity; zero or less removes it. */
  async updateQuantity(
    customerId: string,
    productKey: string,
    quantity: number,
  ): Promise<CartView> {
    if (!Number.isInteger(quantity)) {
      throw new BadRequestException('Quantity must be an integer');
    }
    if (quantity <= 0) return this.removeItem(customerId, productKey);

    return this.dataSource.transaction(async (manager) => {
      const { order, line } = await this.findCartLine(
        customerId,
        productKey,
        manager,
      );
      const product = await this.products.getActiveByKey(productKey, manager);
      this.assertInStock(product, quantity);

      line.quantity = quantity;
      await manager.getRepository(OrderLine).save(line);

      this.logger.log(
        `cart item updated orderId=${order.id} product=${productKey} quantity=${quantity}`,
      );
      return this.toView(
        order.id,
        await this.orders.getOrderLines(order.id, manager),
      );
    });
  }

  /** Removes the line; an emptied cart is deleted. */
  async removeItem(customerId: string, productKey: string): Promise<CartView> {
    return this.dataSource.transaction(async (manager) => {
      const { order, line } = await this.findCartLine(
        customerId,
        productKey,
        manager,
      );
      await manager.getRepository(OrderLine).delete({ id: line.id });
      this.logger.log(`cart item removed orderId=${order.id} product=${productKey}`);

      const remaining = await this.orders.getOrderLines(order.id, manager);
      if (remaining.length > 0) return this.toView(order.id, remaining);

      await this.orders.deleteOpenOrder(order, manager);
      return emptyCart();
    });
  }

  async clearCart(customerId: string): Promise<CartView> {
    await this.customers.getById(customerId);

    return this.dataSource.transaction(async (manager) => {
      const order = await this.orders.getOpenOrderForCustomer(
        customerId,
        manager,
        { lock: true },
      );
      if (order) await this.orders.deleteOpenOrder(order, manager);
      return emptyCart();
    });
  }

  private async findCartLine(
    customerId: string,
    productKey: string,
    manager: EntityManager,
  ): Promise<{ order: Order; line: OrderLine }> {
    const order = await this.orders.getOpenOrderForCustomer(
      customerId,
      manager,
      { lock: true },
    );
    if (!order) throw new NotFoundException('No active cart found');

    // matched by key through the join so inactive products can still be removed
    const line = await manager.getRepository(OrderLine).findOne({
      where: { orderId: order.id, product: { key: productKey } },
      relations: { product: true },
    });
    if (!line) {
      throw new NotFoundException(`Product '${productKey}' is not in the cart`);
    }
    return { order, line };
  }

  private assertInStock(product: Product, quantity: number): void {
    if (quantity > product.unitsInStock) {
      throw new BadRequestException(
        `Only ${product.unitsInStock} units of '${product.key}' in stock`,
      );
    }
  }

  private toView(orderId: string, lines: OrderLine[]): CartView {
    return {
      orderId,
      lines: lines.map((line) => ({
        productKey: line.product?.key ?? null,
        productName: line.product?.name ?? null,
        quantity: line.quantity,
        unitPrice: line.unitPrice,
        discountPercent: line.discountPercent,
        lineTotal: lineTotal(line),
      })),
      totalItems: countItems(lines),
      total: computeOrderTotal(lines),
    };
  }
}
