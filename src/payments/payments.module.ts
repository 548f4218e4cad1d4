import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { PaymentsController } from './payments.controller';
import { PaymentsService } from './payments.service';
import { PaymentLedgerService } from './payment-ledger.service';
import { PaymentMethodsService } from './payment-methods.service';
import { PaymentGatewayClient } from './gateway/payment-gateway.client';

import { PaymentTransaction } from './payment-transaction.entity';
import { PaymentMethod } from './payment-method.entity';
import { EventLog } from '../common/event-log.entity';

import { CustomersModule } from '../modules/customers/customers.module';
import { OrdersModule } from '../modules/orders/orders.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([PaymentTransaction, PaymentMethod, EventLog]),
    CustomersModule,
    OrdersModule,
  ],
  controllers: [PaymentsController],
  providers: [
    PaymentsService,
    PaymentLedgerService,
    PaymentMethodsService,
    PaymentGatewayClient,
  ],
  exports: [PaymentsService],
})
export class PaymentsModule {}
