export { buildSchedule } from './scheduler.js';
