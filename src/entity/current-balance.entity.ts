// src/entity/current-balance.entity.ts
import { Entity, PrimaryColumn, Column } from 'typeorm';
import { CurrencyMap } from '../common/types/balance.types';

@Entity('current_balance')
export class CurrentBalance {
  @PrimaryColumn({ name: 'user_id', type: 'int', unsigned: true })
  userId!: number;

  // currency -> amount; parsed and checked by the store, never trusted as-is
  @Column({ type: 'simple-json' })
  balances!: CurrencyMap;
}
