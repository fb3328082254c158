import type { ClockProvider } from '../../application/providers/ClockProvider';

export class SystemClock implements ClockProvider {
    now(): Date {
        return new Date();
    }
}
