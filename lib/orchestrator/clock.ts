export interface Clock {
  now(): number
}

// performance.now() never jumps backwards, unlike Date.now()
export const monotonicClock: Clock = {
  now: () => performance.now(),
}
