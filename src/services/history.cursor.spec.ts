import { PastBalanceRecord } from '../common/types/balance.types';
import { HistoryCursor } from './history.cursor';

function records(count: number): PastBalanceRecord[] {
  return Array.from({ length: count }, (_, index) => ({
    id: (index + 1) * 10,
    userId: 1,
    balances: { gold: index },
    changed: 1_000 + index,
  }));
}

function fetcherOver(source: PastBalanceRecord[]) {
  return jest.fn(async (afterId: number, limit: number) =>
    source.filter((record) => record.id > afterId).slice(0, limit),
  );
}

describe('HistoryCursor', () => {
  it('reads nothing until iterated', () => {
    const fetchPage = fetcherOver(records(3));

    new HistoryCursor(fetchPage, 2);

    expect(fetchPage).not.toHaveBeenCalled();
  });

  it('walks pages by the last id seen', async () => {
    const fetchPage = fetcherOver(records(4));

    const all = await new HistoryCursor(fetchPage, 2).toArray();

    expect(all.map((record) => record.id)).toEqual([10, 20, 30, 40]);
    expect(fetchPage.mock.calls).toEqual([
      [0, 2],
      [20, 2],
      [40, 2],
    ]);
  });

  it('stops after a short page', async () => {
    const fetchPage = fetcherOver(records(3));

    await new HistoryCursor(fetchPage, 2).toArray();

    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('fetches only what the consumer asks for', async () => {
    const fetchPage = fetcherOver(records(10));

    for await (const record of new HistoryCursor(fetchPage, 3)) {
      expect(record.id).toBe(10);
      break;
    }

    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('starts over on every iteration', async () => {
    const cursor = new HistoryCursor(fetcherOver(records(3)), 5);

    const first = await cursor.toArray();
    const second = await cursor.toArray();

    expect(second).toEqual(first);
    expect(first).toHaveLength(3);
  });
});
