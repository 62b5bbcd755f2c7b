export {
  calendarFilename,
  convertRosterFile,
  convertRosterText,
  effectiveCutoff,
} from './convert.js';
export type { ConversionOptions, ConversionResult } from './convert.js';
