/**
 * Time sync & IMU alignment constants
 */

export const TIME_SYNC_CONFIG = {
  // Timestamp reads after the write; the median offset is reported
  READ_SAMPLES: 5,
  // Share of samples (highest RTT first) left out of the median
  OUTLIER_REMOVAL_PERCENT: 0.2,
  // The device RTC has one-second resolution
  MAX_OFFSET_SECONDS: 2,
} as const;

export const ALIGNMENT_CONFIG = {
  TOLERANCE_MS: 20,
  // Skews kept for the rolling statistics
  WINDOW: 200,
} as const;
