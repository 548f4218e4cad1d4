import { ConflictException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { In } from 'typeorm';
import { PaymentLedgerService } from './payment-ledger.service';
import { PaymentTransaction } from './payment-transaction.entity';
import { PaymentTransactionStatus } from './enums/payment-transaction-status.enum';
import { PaymentMethodCode } from './enums/payment-method-code.enum';
import { createMockRepo, MockRepo } from '@/test-utils/mock-repo';

describe('PaymentLedgerService', () => {
  let service: PaymentLedgerService;
  let txRepo: MockRepo<PaymentTransaction>;

  beforeEach(async () => {
    txRepo = createMockRepo<PaymentTransaction>();
    txRepo.save.mockImplementation(async (tx: object) => ({
      id: 'tx-1',
      ...tx,
    }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PaymentLedgerService,
        { provide: getRepositoryToken(PaymentTransaction), useValue: txRepo },
      ],
    }).compile();

    service = module.get(PaymentLedgerService);
  });

  it('records a new attempt with empty gateway fields', async () => {
    const tx = await service.createTransaction({
      orderId: 'order-1',
      customerId: 'cust-1',
      paymentMethod: PaymentMethodCode.CARD,
      amount: 42.5,
      status: PaymentTransactionStatus.PROCESSING,
      idempotencyKey: 'key-1',
    });

    expect(tx).toEqual({
      id: 'tx-1',
      orderId: 'order-1',
      customerId: 'cust-1',
      paymentMethod: PaymentMethodCode.CARD,
      amount: 42.5,
      status: PaymentTransactionStatus.PROCESSING,
      idempotencyKey: 'key-1',
      externalTransactionId: null,
      errorMessage: null,
    });
  });

  it('defaults the idempotency key to null for bank attempts', async () => {
    const tx = await service.createTransaction({
      orderId: 'order-1',
      customerId: 'cust-1',
      paymentMethod: PaymentMethodCode.BANK,
      amount: 10,
      status: PaymentTransactionStatus.PENDING,
    });

    expect(tx.idempotencyKey).toBeNull();
  });

  it('updates only rows that are still open', async () => {
    txRepo.update.mockResolvedValue({ affected: 1 });

    await service.updateTransactionStatus(
      'tx-1',
      PaymentTransactionStatus.COMPLETED,
      { externalTransactionId: 'gw-77' },
    );

    expect(txRepo.update).toHaveBeenCalledWith(
      {
        id: 'tx-1',
        status: In([
          PaymentTransactionStatus.PENDING,
          PaymentTransactionStatus.PROCESSING,
        ]),
      },
      {
        status: PaymentTransactionStatus.COMPLETED,
        externalTransactionId: 'gw-77',
      },
    );
  });

  it('refuses to touch a settled row', async () => {
    txRepo.update.mockResolvedValue({ affected: 0 });

    await expect(
      service.updateTransactionStatus('tx-1', PaymentTransactionStatus.FAILED),
    ).rejects.toThrow(
      new ConflictException('Payment transaction tx-1 is already settled'),
    );
  });

  it('lists the attempts of an order oldest first', async () => {
    txRepo.find.mockResolvedValue([]);

    await service.listForOrder('order-1');

    expect(txRepo.find).toHaveBeenCalledWith({
      where: { orderId: 'order-1' },
      order: { processedAt: 'ASC' },
    });
  });
});
