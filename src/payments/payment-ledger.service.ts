import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';

import { PaymentTransaction } from './payment-transaction.entity';
import { PaymentTransactionStatus } from './enums/payment-transaction-status.enum';
import { PaymentMethodCode } from './enums/payment-method-code.enum';

const OPEN_STATUSES = [
  PaymentTransactionStatus.PENDING,
  PaymentTransactionStatus.PROCESSING,
];

export type CreateTransactionInput = {
  orderId: string;
  customerId: string;
  paymentMethod: PaymentMethodCode;
  amount: number;
  status: PaymentTransactionStatus.PENDING | PaymentTransactionStatus.PROCESSING;
  idempotencyKey?: string | null;
};

export type TransactionStatusDetails = {
  externalTransactionId?: string | null;
  errorMessage?: string | null;
};

@Injectable()
export class PaymentLedgerService {
  private readonly logger = new Logger(PaymentLedgerService.name);

  constructor(
    @InjectRepository(PaymentTransaction)
    private readonly txRepo: Repository<PaymentTransaction>,
  ) {}

  private transactions(manager?: EntityManager): Repository<PaymentTransaction> {
    return manager ? manager.getRepository(PaymentTransaction) : this.txRepo;
  }

  async createTransaction(
    input: CreateTransactionInput,
    manager?: EntityManager,
  ): Promise<PaymentTransaction> {
    const repo = this.transactions(manager);
    const tx = await repo.save(
      repo.create({
        orderId: input.orderId,
        customerId: input.customerId,
        paymentMethod: input.paymentMethod,
        amount: input.amount,
        status: input.status,
        idempotencyKey: input.idempotencyKey ?? null,
        externalTransactionId: null,
        errorMessage: null,
      }),
    );

    this.logger.log(
      `ledger row created id=${tx.id} orderId=${input.orderId} method=${input.paymentMethod} status=${input.status} amount=${input.amount.toFixed(2)}`,
    );
    return tx;
  }

  /**
   * Moves an open (PENDING or PROCESSING) row to `status`. Settled rows are
   * immutable, so an update that matches nothing is a conflict.
   */
  async updateTransactionStatus(
    id: string,
    status: PaymentTransactionStatus,
    details: TransactionStatusDetails = {},
    manager?: EntityManager,
  ): Promise<void> {
    const result = await this.transactions(manager).update(
      { id, status: In(OPEN_STATUSES) },
      {
        status,
        ...(details.externalTransactionId !== undefined
          ? { externalTransactionId: details.externalTransactionId }
          : {}),
        ...(details.errorMessage !== undefined
          ? { errorMessage: details.errorMessage }
          : {}),
      },
    );
    if (!result.affected) {
      throw new ConflictException(`Payment transaction ${id} is already settled`);
    }

    this.logger.log(`ledger row updated id=${id} status=${status}`);
  }

  listForOrder(orderId: string): Promise<PaymentTransaction[]> {
    return this.txRepo.find({
      where: { orderId },
      order: { processedAt: 'ASC' },
    });
  }

  listForCustomer(customerId: string): Promise<PaymentTransaction[]> {
    return this.txRepo.find({
      where: { customerId },
      order: { processedAt: 'DESC' },
    });
  }
}
