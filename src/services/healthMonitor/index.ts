/**
 * Health Monitor Module
 *
 * Main Components:
 * - MonitorService: supervises one poll loop per target, owns alerts and reporting
 * - PollLoop: probe / update / evaluate / emit cycle for a single target
 * - HealthAggregate: rolling health state and bounded history of one target
 */

export { MonitorService } from './MonitorService.js';
export type { MonitorServiceOptions, MonitorServiceEvents } from './MonitorService.js';
export { PollLoop } from './PollLoop.js';
export type { PollLoopConfig, PollLoopState } from './PollLoop.js';
export { HealthAggregate, classifyStatus, computeHealthScore, responseTimeScore } from './HealthAggregate.js';
export type { HealthSnapshot, HealthAggregateOptions } from './HealthAggregate.js';
