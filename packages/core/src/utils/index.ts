export {
  ABSENT,
  present,
  isAbsent,
  fromDriverValue,
  toDriverValue,
  fragmentEntries,
  rowFromObject,
  rowToObject,
} from './values.js';
export {
  isValidIdentifier,
  validateIdentifier,
  parseQualifiedColumn,
} from './identifiers.js';
export type { ParsedColumn } from './identifiers.js';
