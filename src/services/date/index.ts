export {
  buildDateRange,
  selectWindowMode,
} from './range.js';

export type {
  DateConvention,
  WeekStart,
  WindowFlags,
  WindowMode,
} from './range.js';
