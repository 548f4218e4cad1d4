import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

export type EventLogPayload = Record<string, unknown>;

/** Append-only audit trail of checkout and payment events. */
@Entity('event_logs')
@Index(['aggregateId', 'createdAt'])
export class EventLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 64 })
  type!: string;

  // order the event belongs to
  @Column({ type: 'uuid', nullable: true })
  aggregateId!: string | null;

  @Column({ type: 'jsonb', nullable: true })
  payload!: EventLogPayload | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
