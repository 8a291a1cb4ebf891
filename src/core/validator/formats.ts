import { isIPv4, isIPv6 } from 'node:net';

export type FormatCheck = (value: string) => boolean;

const DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4}-\d{2}-\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;
const HOSTNAME_LABEL = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/;
const URI = /^[a-zA-Z][a-zA-Z0-9+.-]*:[^\s]*$/;

function isDate(value: string): boolean {
    const match = DATE.exec(value);
    if (!match) return false;
    const [, year, month, day] = match.map(Number);
    const date = new Date(Date.UTC(year, month - 1, day));
    return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function isDateTime(value: string): boolean {
    const match = DATE_TIME.exec(value);
    if (!match) return false;
    const [, date, hours, minutes, seconds] = match;
    // leap seconds allowed
    return isDate(date) && Number(hours) < 24 && Number(minutes) < 60 && Number(seconds) <= 60;
}

function isHostname(value: string): boolean {
    return value.length <= 255 && value.split('.').every(label => HOSTNAME_LABEL.test(label));
}

/**
 * Draft-4 format checks. Formats not listed here always pass.
 */
export const DRAFT4_FORMATS: Readonly<Record<string, FormatCheck>> = Object.freeze({
    'date-time': isDateTime,
    date: isDate,
    email: (value: string) => value.includes('@'),
    hostname: isHostname,
    ipv4: isIPv4,
    ipv6: isIPv6,
    uri: (value: string) => URI.test(value),
});
