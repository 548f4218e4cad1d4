import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { PaymentMethodCode } from './enums/payment-method-code.enum';
import { PaymentTransactionStatus } from './enums/payment-transaction-status.enum';
import { Order } from '../modules/orders/order.entity';
import { decimalTransformer } from '../common/transforms/decimal.transform';

/** One row per payment attempt. Settled rows are never written again. */
@Entity('payment_transactions')
@Index(['orderId', 'processedAt'])
@Index(['customerId', 'processedAt'])
export class PaymentTransaction {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  orderId!: string;

  @ManyToOne(() => Order, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'orderId' })
  order?: Order;

  @Column({ type: 'uuid' })
  customerId!: string;

  @Column({ type: 'varchar', length: 50 })
  paymentMethod!: PaymentMethodCode;

  // total at attempt time
  @Column('numeric', {
    precision: 12,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount!: number;

  @Column({
    type: 'enum',
    enum: PaymentTransactionStatus,
    default: PaymentTransactionStatus.PENDING,
  })
  status!: PaymentTransactionStatus;

  @CreateDateColumn({ type: 'timestamptz' })
  processedAt!: Date;

  @Column({ type: 'varchar', length: 128, nullable: true })
  externalTransactionId!: string | null;

  // sent as Idempotency-Key on every gateway retry of this attempt
  @Index({ unique: true })
  @Column({ type: 'uuid', nullable: true })
  idempotencyKey!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  errorMessage!: string | null;
}
