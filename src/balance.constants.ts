// src/balance.constants.ts

/** Injection token for the resolved `BalanceStoreOptions`. */
export const BALANCE_STORE_OPTIONS = Symbol('BALANCE_STORE_OPTIONS');
