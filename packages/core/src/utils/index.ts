export { normalizeText, tokenSort } from './normalize.js';
export {
    parseMdyDate,
    parseDmyDate,
    parseIsoDate,
    formatIsoDate,
    addDays,
    monthKey,
    monthRange,
    isValidDate,
    localToday,
} from './date-parse.js';
export { generateRecordId, baseRecordId, nextAvailableId } from './record-id.js';
