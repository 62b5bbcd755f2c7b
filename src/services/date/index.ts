export {
  isValidTimezone,
  requireTimezone,
  toUtcInstant,
  isExistingLocalTime,
  toLocalTime,
} from './timezone.js';

export type { LocalTime } from './timezone.js';
