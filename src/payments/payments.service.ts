import {
  BadGatewayException,
  BadRequestException,
  Injectable,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { randomUUID } from 'crypto';

import { PaymentTransaction } from './payment-transaction.entity';
import { PaymentLedgerService } from './payment-ledger.service';
import { PaymentMethodsService } from './payment-methods.service';
import {
  GatewayTransportError,
  PaymentGatewayClient,
  type GatewayResult,
  type TerminalGatewayRequest,
} from './gateway/payment-gateway.client';
import {
  bankInvoiceFileName,
  generateBankInvoice,
  invoiceValidUntil,
} from './invoice/bank-invoice';
import {
  PaymentMethodCode,
  parsePaymentMethodCode,
} from './enums/payment-method-code.enum';
import { PaymentTransactionStatus } from './enums/payment-transaction-status.enum';
import { CardDetailsDto, ProcessPaymentDto } from './dto/process-payment.dto';
import type { PaymentsConfig } from '../config/configuration';
import { EventLog, type EventLogPayload } from '../common/event-log.entity';
import { CustomersService } from '../modules/customers/customers.service';
import { Order } from '../modules/orders/order.entity';
import { OrdersService } from '../modules/orders/orders.service';
import { OrderEvent } from '../modules/orders/order-state-machine';
import { computeOrderTotal } from '../modules/orders/order-totals';

const PAYMENT_IN_PROGRESS = 'Payment already in progress for this cart';
const GATEWAY_UNREACHABLE =
  'Payment gateway unreachable; order held for reconciliation';

type Dispatch =
  | { method: PaymentMethodCode.BANK }
  | { method: PaymentMethodCode.TERMINAL }
  | { method: PaymentMethodCode.CARD; card: CardDetailsDto };

type OpenedAttempt = {
  order: Order;
  transaction: PaymentTransaction;
  amount: number;
};

export type BankPaymentData = {
  orderId: string;
  transactionId: string;
  amount: number;
  fileName: string;
  invoice: string; // base64
  validUntil: string;
};

export type GatewayPaymentData = {
  orderId: string;
  transactionId: string;
  amount: number;
  externalTransactionId: string | null;
  attempts: number;
};

export type PaymentResult =
  | {
      success: true;
      method: PaymentMethodCode.BANK;
      message: string;
      data: BankPaymentData;
    }
  | {
      success: boolean;
      method: PaymentMethodCode.TERMINAL | PaymentMethodCode.CARD;
      message: string;
      data: GatewayPaymentData;
    };

@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);
  private readonly invoiceValidityDays: number;

  constructor(
    private readonly dataSource: DataSource,
    configService: ConfigService,
    private readonly customers: CustomersService,
    private readonly orders: OrdersService,
    private readonly methods: PaymentMethodsService,
    private readonly ledger: PaymentLedgerService,
    private readonly gateway: PaymentGatewayClient,

    @InjectRepository(EventLog)
    private readonly eventLogRepo: Repository<EventLog>,
  ) {
    this.invoiceValidityDays =
      configService.getOrThrow<PaymentsConfig>('payments').bankInvoiceValidityDays;
  }

  private async logEvent(
    type: string,
    aggregateId: string,
    payload: EventLogPayload | null,
    manager?: EntityManager,
  ) {
    const repo = manager ? manager.getRepository(EventLog) : this.eventLogRepo;
    await repo.save(repo.create({ type, aggregateId, payload }));
  }

  /**
   * Pays the customer's cart with `request.method`.
   *
   * Every precondition is checked before anything is written. The cart then
   * moves to CHECKOUT together with a new ledger row in one transaction. Bank
   * transfers stop there and hand back an invoice; gateway methods call out
   * and settle order and ledger row together.
   */
  async processPayment(
    customerId: string,
    request: ProcessPaymentDto,
  ): Promise<PaymentResult> {
    await this.customers.getById(customerId);
    const dispatch = await this.resolveDispatch(request);

    if (dispatch.method === PaymentMethodCode.BANK) {
      const attempt = await this.openAttempt(customerId, dispatch.method, null);
      return this.issueBankInvoice(customerId, attempt);
    }

    const idempotencyKey = randomUUID();
    const attempt = await this.openAttempt(
      customerId,
      dispatch.method,
      idempotencyKey,
    );
    return this.chargeThroughGateway(customerId, dispatch, attempt, idempotencyKey);
  }

  async listTransactionsForOrder(
    customerId: string,
    orderId: string,
  ): Promise<PaymentTransaction[]> {
    await this.orders.getOrderForCustomer(orderId, customerId);
    return this.ledger.listForOrder(orderId);
  }

  listTransactionsForCustomer(customerId: string): Promise<PaymentTransaction[]> {
    return this.ledger.listForCustomer(customerId);
  }

  private async resolveDispatch(request: ProcessPaymentDto): Promise<Dispatch> {
    const method = parsePaymentMethodCode(request.method);
    if (!method || !(await this.methods.isMethodActive(method))) {
      throw new BadRequestException(
        `Unsupported payment method: ${request.method}`,
      );
    }

    if (method === PaymentMethodCode.CARD) {
      if (!request.card) {
        throw new BadRequestException('Card payment requires card details');
      }
      return { method, card: request.card };
    }
    return { method };
  }

  private openAttempt(
    customerId: string,
    method: PaymentMethodCode,
    idempotencyKey: string | null,
  ): Promise<OpenedAttempt> {
    return this.dataSource.transaction(async (manager) => {
      const order = await this.orders.getOpenOrderForCustomer(
        customerId,
        manager,
      );
      // an emptied cart may be deleted while we wait for the lock
      if (!order || !(await this.orders.lockOrder(order.id, manager))) {
        throw new BadRequestException('No active cart found');
      }

      const lines = await this.orders.getOrderLines(order.id, manager);
      if (lines.length === 0) throw new BadRequestException('Cart is empty');
      const amount = computeOrderTotal(lines);

      // guarded on the version read above; a concurrent attempt matches nothing
      const checkedOut = await this.orders.transitionOrder(
        order,
        OrderEvent.CHECKOUT,
        manager,
        PAYMENT_IN_PROGRESS,
      );

      const transaction = await this.ledger.createTransaction(
        {
          orderId: order.id,
          customerId,
          paymentMethod: method,
          amount,
          status:
            method === PaymentMethodCode.BANK
              ? PaymentTransactionStatus.PENDING
              : PaymentTransactionStatus.PROCESSING,
          idempotencyKey,
        },
        manager,
      );

      await this.logEvent(
        'checkout.started',
        order.id,
        { method, amount, transactionId: transaction.id },
        manager,
      );

      return { order: checkedOut, transaction, amount };
    });
  }

  private issueBankInvoice(
    customerId: string,
    { order, transaction, amount }: OpenedAttempt,
  ): PaymentResult {
    const createdAt = new Date();
    const validUntil = invoiceValidUntil(createdAt, this.invoiceValidityDays);
    const invoice = generateBankInvoice({
      customerId,
      orderId: order.id,
      amount,
      createdAt,
      validUntil,
    });

    this.logger.log(
      `bank invoice issued orderId=${order.id} transactionId=${transaction.id} validUntil=${validUntil.toISOString()}`,
    );

    return {
      success: true,
      method: PaymentMethodCode.BANK,
      message: 'Bank invoice generated',
      data: {
        orderId: order.id,
        transactionId: transaction.id,
        amount,
        fileName: bankInvoiceFileName(order.id),
        invoice: invoice.toString('base64'),
        validUntil: validUntil.toISOString(),
      },
    };
  }

  private async chargeThroughGateway(
    customerId: string,
    dispatch: Exclude<Dispatch, { method: PaymentMethodCode.BANK }>,
    { order, transaction, amount }: OpenedAttempt,
    idempotencyKey: string,
  ): Promise<PaymentResult> {
    const base: TerminalGatewayRequest = {
      transactionAmount: amount,
      accountNumber: customerId,
      invoiceNumber: order.id,
    };

    let result: GatewayResult;
    try {
      result =
        dispatch.method === PaymentMethodCode.CARD
          ? await this.gateway.call(
              PaymentMethodCode.CARD,
              {
                ...base,
                cardHolderName: dispatch.card.holder,
                cardNumber: dispatch.card.cardNumber,
                expirationMonth: dispatch.card.monthExpire,
                expirationYear: dispatch.card.yearExpire,
                cvv: dispatch.card.cvv2,
              },
              idempotencyKey,
            )
          : await this.gateway.call(
              PaymentMethodCode.TERMINAL,
              base,
              idempotencyKey,
            );
    } catch (err: unknown) {
      if (!(err instanceof GatewayTransportError)) throw err;
      await this.holdForReconciliation(order, transaction, err);
      throw new BadGatewayException(GATEWAY_UNREACHABLE);
    }

    const { approved, externalTransactionId, attempts } = result;
    await this.dataSource.transaction(async (manager) => {
      await this.ledger.updateTransactionStatus(
        transaction.id,
        approved
          ? PaymentTransactionStatus.COMPLETED
          : PaymentTransactionStatus.FAILED,
        approved
          ? { externalTransactionId }
          : { errorMessage: `Declined by gateway after ${attempts} attempts` },
        manager,
      );
      await this.orders.transitionOrder(
        order,
        approved ? OrderEvent.PAY : OrderEvent.CANCEL,
        manager,
      );
      await this.logEvent(
        approved ? 'payment.completed' : 'payment.failed',
        order.id,
        {
          method: dispatch.method,
          transactionId: transaction.id,
          attempts,
        },
        manager,
      );
    });

    if (approved) {
      this.logger.log(
        `payment completed orderId=${order.id} transactionId=${transaction.id} method=${dispatch.method} attempts=${attempts}`,
      );
    } else {
      this.logger.warn(
        `payment declined orderId=${order.id} transactionId=${transaction.id} method=${dispatch.method} attempts=${attempts}`,
      );
    }

    return {
      success: approved,
      method: dispatch.method,
      message: approved ? 'Payment completed' : 'Payment declined',
      data: {
        orderId: order.id,
        transactionId: transaction.id,
        amount,
        externalTransactionId,
        attempts,
      },
    };
  }

  // Outcome unknown: order stays in CHECKOUT and the row stays PROCESSING.
  private async holdForReconciliation(
    order: Order,
    transaction: PaymentTransaction,
    err: GatewayTransportError,
  ): Promise<void> {
    this.logger.error(
      `gateway unreachable orderId=${order.id} transactionId=${transaction.id} attempts=${err.attempts} error="${err.message}"`,
    );

    await this.dataSource.transaction(async (manager) => {
      await this.ledger.updateTransactionStatus(
        transaction.id,
        PaymentTransactionStatus.PROCESSING,
        { errorMessage: err.message.slice(0, 500) },
        manager,
      );
      await this.logEvent(
        'payment.unreachable',
        order.id,
        { transactionId: transaction.id, attempts: err.attempts },
        manager,
      );
    });
  }
}
