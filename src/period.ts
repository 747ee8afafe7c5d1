import { InvalidPeriodError } from './errors';

/** A year-month identifier such as `2024-01`. */
export type Period = string;

const PERIOD_FORMAT = /^\d{4}-\d{2}$/;

export function validatePeriodFormat(period: string): boolean {
    return PERIOD_FORMAT.test(period);
}

export function assertPeriod(period: string): Period {
    if (!validatePeriodFormat(period)) {
        throw new InvalidPeriodError(period);
    }
    return period;
}

export function periodYear(period: Period): string {
    return assertPeriod(period).substring(0, 4);
}
