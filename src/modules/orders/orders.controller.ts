import { Controller, Get, Param } from '@nestjs/common';

import { OrdersService } from './orders.service';
import { Order } from './order.entity';
import { computeOrderTotal, countItems, lineTotal } from './order-totals';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';

type OrderLineResponse = {
  productId: string;
  productKey: string | null;
  quantity: number;
  unitPrice: number;
  discountPercent: number;
  lineTotal: number;
};

type OrderResponse = {
  id: string;
  customerId: string;
  status: string;
  total: number;
  totalItems: number;
  lines: OrderLineResponse[];
  createdAt: string;
  updatedAt: string;
  finalizedAt: string | null;
};

@Controller('customers/:customerId/orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  private serializeOrder(order: Order): OrderResponse {
    const lines = order.lines ?? [];
    return {
      id: order.id,
      customerId: order.customerId,
      status: order.status,
      total: computeOrderTotal(lines),
      totalItems: countItems(lines),
      lines: lines.map((line) => ({
        productId: line.productId,
        productKey: line.product?.key ?? null,
        quantity: line.quantity,
        unitPrice: line.unitPrice,
        discountPercent: line.discountPercent,
        lineTotal: lineTotal(line),
      })),
      createdAt: order.createdAt.toISOString(),
      updatedAt: order.updatedAt.toISOString(),
      finalizedAt: order.finalizedAt ? order.finalizedAt.toISOString() : null,
    };
  }

  @Get()
  async list(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
  ) {
    const orders = await this.ordersService.listForCustomer(customerId);
    return orders.map((order) => this.serializeOrder(order));
  }

  @Get('history')
  async history(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
  ) {
    const orders = await this.ordersService.listHistory(customerId);
    return orders.map((order) => this.serializeOrder(order));
  }

  @Get(':orderId')
  async getOne(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
    @Param('orderId', new ParseRequiredUuidPipe('orderId')) orderId: string,
  ) {
    const order = await this.ordersService.getOrderForCustomer(
      orderId,
      customerId,
    );
    return this.serializeOrder(order);
  }
}
