/**
 * Source of "now" for use cases. Domain code never reads the system clock;
 * it receives timestamps from here.
 */
export interface ClockProvider {
    now(): Date;
}
