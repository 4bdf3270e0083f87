import { CurrentBalance } from './current-balance.entity';
import { PastBalance } from './past-balance.entity';

/** Register these with the host's TypeORM `DataSource`. */
export const BALANCE_ENTITIES = [CurrentBalance, PastBalance];

export { CurrentBalance, PastBalance };
