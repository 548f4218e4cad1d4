import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';

import { PaymentsService } from './payments.service';
import { PaymentMethodsService } from './payment-methods.service';
import { ProcessPaymentDto } from './dto/process-payment.dto';
import { PaymentTransaction } from './payment-transaction.entity';
import { PaymentMethod } from './payment-method.entity';
import { ParseRequiredUuidPipe } from '../common/pipes/parse-required-uuid.pipe';

type PaymentMethodResponse = {
  code: string;
  title: string;
  description: string;
  imageUrl: string;
  displayOrder: number;
};

type PaymentTransactionResponse = {
  id: string;
  orderId: string;
  paymentMethod: string;
  amount: number;
  status: string;
  processedAt: string;
  externalTransactionId: string | null;
  errorMessage: string | null;
};

@Controller()
export class PaymentsController {
  constructor(
    private readonly paymentsService: PaymentsService,
    private readonly paymentMethodsService: PaymentMethodsService,
  ) {}

  private serializeMethod(method: PaymentMethod): PaymentMethodResponse {
    return {
      code: method.code,
      title: method.title,
      description: method.description,
      imageUrl: method.imageUrl,
      displayOrder: method.displayOrder,
    };
  }

  private serializeTransaction(
    tx: PaymentTransaction,
  ): PaymentTransactionResponse {
    return {
      id: tx.id,
      orderId: tx.orderId,
      paymentMethod: tx.paymentMethod,
      amount: tx.amount,
      status: tx.status,
      processedAt: tx.processedAt.toISOString(),
      externalTransactionId: tx.externalTransactionId ?? null,
      errorMessage: tx.errorMessage ?? null,
    };
  }

  @Get('payment-methods')
  async listMethods() {
    const methods = await this.paymentMethodsService.listActiveMethods();
    return methods.map((method) => this.serializeMethod(method));
  }

  // a decline is a normal result with success=false, not an HTTP error
  @Post('customers/:customerId/payments')
  @HttpCode(HttpStatus.OK)
  processPayment(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
    @Body() dto: ProcessPaymentDto,
  ) {
    return this.paymentsService.processPayment(customerId, dto);
  }

  @Get('customers/:customerId/payments')
  async listForCustomer(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
  ) {
    const txs = await this.paymentsService.listTransactionsForCustomer(customerId);
    return txs.map((tx) => this.serializeTransaction(tx));
  }

  @Get('customers/:customerId/orders/:orderId/transactions')
  async listForOrder(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
    @Param('orderId', new ParseRequiredUuidPipe('orderId')) orderId: string,
  ) {
    const txs = await this.paymentsService.listTransactionsForOrder(
      customerId,
      orderId,
    );
    return txs.map((tx) => this.serializeTransaction(tx));
  }
}
