export {
    parseDateValue,
    parseDateString,
    parseIsoDate,
    parseCompactDate,
    parseMdyDate,
    parseMonthNameDate,
    excelSerialToDate,
    formatIsoDate,
    isValidDate,
} from './date-parse.js';
export { parseAmountValue, toDecimalString, formatMoney, isDecimalString } from './amount-parse.js';
export { normalizeDescription, normalizeColumnName, stripBom } from './normalize.js';
