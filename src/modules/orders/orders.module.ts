import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { Order } from './order.entity';
import { OrderLine } from './order-line.entity';
import { OrdersService } from './orders.service';
import { CartService } from './cart.service';
import { OrdersController } from './orders.controller';
import { CartController } from './cart.controller';
import { CustomersModule } from '../customers/customers.module';
import { ProductsModule } from '../products/products.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([Order, OrderLine]),
    CustomersModule,
    ProductsModule,
  ],
  controllers: [CartController, OrdersController],
  providers: [OrdersService, CartService],
  exports: [OrdersService],
})
export class OrdersModule {}
