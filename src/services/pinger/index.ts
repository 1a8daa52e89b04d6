export { HttpPinger, parseHeaderArgs } from './HttpPinger.js';
export type { PingOptions, PingResult, PingStatistics, HttpPingerDeps } from './HttpPinger.js';
