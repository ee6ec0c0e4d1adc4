// Time helpers for report stamps and file names
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(utc);

/**
 * Format a date for display
 */
export function formatDate(date: Date | string | undefined, format = 'YYYY-MM-DD HH:mm:ss'): string {
    if (!date) {
        return '-';
    }
    return dayjs(date).format(format);
}

/**
 * Compact local timestamp used in generated folder names, e.g. 20240131_142501
 */
export function fileTimestamp(date: Date = new Date()): string {
    return dayjs(date).format('YYYYMMDD_HHmmss');
}

/**
 * UTC timestamp with nanosecond-style padding, as stored by the users-roles service
 */
export function serviceTimestamp(date: Date = new Date()): string {
    return `${dayjs(date).utc().format('YYYY-MM-DDTHH:mm:ss.SSS')}000000Z`;
}
