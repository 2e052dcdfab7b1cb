// Centralized library metadata and job timing defaults.
export const APP_NAME = "reelcap";

export const DEFAULT_FPS = 30;

// How often the supervisor checks the stop signal and process liveness.
export const POLL_INTERVAL_MS = 50;
// Time ffmpeg gets after SIGINT to finalize the container before SIGKILL.
export const GRACE_WINDOW_MS = 500;
// How long a terminal job stays the session's current job before it is released.
export const COMPLETION_HOLD_MS = 1500;

// Conversion progress falls back to this when the input duration cannot be probed.
export const ASSUMED_CONVERSION_SECONDS = 30;

export const LOG_BUFFER_LIMIT = 400;
// Finished jobs a session keeps answering for, besides its current one.
export const RETAINED_JOB_LIMIT = 20;
export const DIAGNOSTIC_TAIL_LINES = 60;

export const TEST_CAPTURE_SECONDS = 3;
export const TEST_CAPTURE_FILE_NAME = `${APP_NAME}_test.mp4`;
