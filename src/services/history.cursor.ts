// src/services/history.cursor.ts
import { PastBalanceRecord } from '../common/types/balance.types';

export type HistoryPageFetcher = (afterId: number, limit: number) => Promise<PastBalanceRecord[]>;

/**
 * Lazy view over a user's past balances, oldest first. Nothing is read until
 * iteration starts; pages are fetched by keyset on `id`, and every new
 * iteration starts over from the first record.
 */
export class HistoryCursor implements AsyncIterable<PastBalanceRecord> {
    constructor(
        private readonly fetchPage: HistoryPageFetcher,
        readonly pageSize: number,
    ) { }

    async *[Symbol.asyncIterator](): AsyncIterator<PastBalanceRecord> {
        let afterId = 0;
        for (;;) {
            const page = await this.fetchPage(afterId, this.pageSize);
            yield* page;

            const last = page[page.length - 1];
            if (page.length < this.pageSize || last === undefined) {
                return;
            }
            afterId = last.id;
        }
    }

    async toArray(): Promise<PastBalanceRecord[]> {
        const records: PastBalanceRecord[] = [];
        for await (const record of this) {
            records.push(record);
        }
        return records;
    }
}
