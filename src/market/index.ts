export type { MarketStateProvider, SlingshotTargetSource } from './types';
export { StaticMarketProvider, fallbackMarketState } from './StaticMarketProvider';
export { MarketRefresher } from './MarketRefresher';
export type { MarketStateSink } from './MarketRefresher';
