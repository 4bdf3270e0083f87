// src/entity/past-balance.entity.ts
import { Entity, PrimaryGeneratedColumn, Column, Index, ValueTransformer } from 'typeorm';
import { CurrencyMap } from '../common/types/balance.types';

// bigint comes back as a string from mysql/postgres, as a number from sqlite
const epochMillis: ValueTransformer = {
  to: (value: number) => value,
  from: (value: string | number | null) => (value === null ? value : Number(value)),
};

@Entity('past_balance')
export class PastBalance {
  @PrimaryGeneratedColumn({ type: 'int', unsigned: true })
  id!: number;

  @Index()
  @Column({ name: 'user_id', type: 'int', unsigned: true })
  userId!: number;

  @Column({ type: 'simple-json' })
  balances!: CurrencyMap;

  /** Record added time, unix epoch in milliseconds. */
  @Index()
  @Column({ type: 'bigint', transformer: epochMillis })
  changed!: number;
}
