export { type LogicalClock, ManualClock } from './logical-clock';
