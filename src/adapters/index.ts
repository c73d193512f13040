export { InMemoryLedger } from './inMemoryLedger';
export type { FeeUpdate } from './inMemoryLedger';
export { StaticOracle } from './staticOracle';
