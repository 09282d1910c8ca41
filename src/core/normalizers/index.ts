export { trim, normalizeText, parseQuantity } from './basic'
export { parseMoneyToCents, formatCents, divideCents, addExact } from './money'
export {
  isValidDate,
  isLeapYear,
  parseDateComponents,
  formatIsoDate,
  normalizeDate,
  splitIsoDate,
  type DateComponents,
  type SlashDateOrder,
} from './date'
