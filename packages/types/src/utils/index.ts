export {
  CURRENCY,
  MONTHLY_FEES,
  PURPOSES,
  DEFAULT_PURPOSE,
  LATE_PAYMENT_CUTOFF_DAY,
} from './constants.js';
export { parseDottedDate, splitISODate, isValidISODate, type DateParts } from './date.js';
export { parseDecimalAmount, roundToTwoDecimals, sumAmounts, formatAmount } from './money.js';
export { MONTH_LABELS, monthLabel, monthKey, resolveMonth, type MonthLabel } from './months.js';
