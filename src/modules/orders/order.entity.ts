import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
  VersionColumn,
} from 'typeorm';
import { OrderLine } from './order-line.entity';

export enum OrderStatus {
  OPEN = 'OPEN',
  CHECKOUT = 'CHECKOUT',
  PAID = 'PAID',
  CANCELLED = 'CANCELLED',
}

@Entity('orders')
// one active cart per customer
@Index('IDX_orders_customer_open', ['customerId'], {
  unique: true,
  where: `"status" = 'OPEN'`,
})
@Index(['customerId', 'createdAt'])
export class Order {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  customerId!: string;

  @Column({ type: 'enum', enum: OrderStatus, default: OrderStatus.OPEN })
  status!: OrderStatus;

  // bumped by every UPDATE; status transitions match on it
  @VersionColumn()
  version!: number;

  @OneToMany(() => OrderLine, (line) => line.order)
  lines?: OrderLine[];

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;

  // set when the order reaches PAID or CANCELLED
  @Column({ type: 'timestamptz', nullable: true })
  finalizedAt!: Date | null;
}
