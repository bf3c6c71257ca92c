import { Entity, Column, PrimaryGeneratedColumn, Index, CreateDateColumn } from 'typeorm';

@Entity()
export class FailedRelay {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  @Index()
  transactionHash: string = '';

  @Column()
  logIndex: number = 0;

  @Column()
  @Index()
  blockNumber: number = 0;

  @Column()
  sourceChainId: number = 0;

  @Column({ type: 'integer', nullable: true })
  destinationChainId: number | null = null;

  @Column({ type: 'text', nullable: true })
  user: string | null = null;

  @Column({ type: 'text', nullable: true })
  token: string | null = null;

  @Column('text')
  amount: string = '0'; // Store as string to handle large numbers

  @Column()
  attempts: number = 0;

  @Column({ type: 'text', nullable: true })
  lastError: string | null = null;

  @CreateDateColumn()
  failedAt!: Date;
}
