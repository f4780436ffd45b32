/**
 * Source of "now" as local wall-clock epoch milliseconds: the instant shifted
 * by the zone offset, so that UTC calendar fields read as local time.
 * Reminder strings carry no zone and are compared against this value.
 */
export interface Clock {
  now(): number
}

export const systemClock: Clock = {
  now() {
    const date = new Date()
    return date.getTime() - date.getTimezoneOffset() * 60_000
  },
}
