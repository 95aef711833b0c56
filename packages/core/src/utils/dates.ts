import { UTCDate } from "@date-fns/utc";
import { addDays, addHours, addMonths, format } from "date-fns";

// Calendar arithmetic runs on UTCDate so results do not depend on the host
// time zone. Month overflow clamps: Jan 31 + 1 month = Feb 28/29.

export function addCalendarMonths(date: Date, months: number): Date {
	return new Date(addMonths(new UTCDate(date.getTime()), months).getTime());
}

export function addCalendarDays(date: Date, days: number): Date {
	return new Date(addDays(new UTCDate(date.getTime()), days).getTime());
}

export function addHoursTo(date: Date, hours: number): Date {
	return addHours(date, hours);
}

/** `YYYYMMDDHHmmss` in UTC. */
export function compactTimestamp(date: Date): string {
	return format(new UTCDate(date.getTime()), "yyyyMMddHHmmss");
}
