// Public entry point.
export { createJobSession } from "@/jobs/jobSession";
export type { JobSession, JobSessionOptions } from "@/jobs/jobSession";
export {
  buildJobArgs,
  interruptProcess,
  runFfmpegJob,
  waitForStopOrExit
} from "@/jobs/ffmpegRunner";
export type {
  FfmpegJobRequest,
  FfmpegRunContext,
  InterruptPath,
  InterruptResult,
  RunPhase,
  RunResult
} from "@/jobs/ffmpegRunner";
export {
  buildCaptureArgs,
  buildGifArgs,
  buildTestCaptureArgs
} from "@/jobs/ffmpegArgs";
export {
  COMPLETION_MARKER,
  MAX_ESTIMATED_RATIO,
  estimateProgress,
  extractOutTime,
  isCompletionLine,
  parseTimecode,
  splitDiagnosticLines
} from "@/jobs/ffmpegProgress";
export {
  IllegalTransitionError,
  canTransition,
  createJobStateMachine,
  isActiveState,
  isTerminalState
} from "@/jobs/jobStateMachine";
export type { JobStateMachine } from "@/jobs/jobStateMachine";
export { createLogChannel } from "@/jobs/logChannel";
export type { LogChannel, LogSender } from "@/jobs/logChannel";
export {
  normalizeJobParameters,
  resolveJobMode,
  validateJobParameters
} from "@/jobs/jobParameters";
export {
  buildDefaultRecordingName,
  buildTestOutputPath,
  deriveFollowOn
} from "@/jobs/output";
export { JobBusyError, JobError, formatError, isJobError } from "@/jobs/errors";
export type { JobErrorCode } from "@/jobs/errors";
export type * from "@/jobs/types";
export { isCommandAvailable } from "@/system/commandAvailability";
export { checkFfmpegTools } from "@/system/ffmpeg";
export type { FfmpegStatus } from "@/system/ffmpeg";
export { listCaptureDevices } from "@/system/captureDevices";
export { checkArtifactFile, verify, verifyArtifact } from "@/system/verifyArtifact";
export type { VerificationFailure, VerificationResult } from "@/system/verifyArtifact";
export { executeCommand, spawnCommand } from "@/system/shellCommand";
export type { ExitStatus, ProcessHandle, SpawnProcess } from "@/system/shellCommand";
export { resolveCaptureSource } from "@/config/capture";
export type { CaptureSource } from "@/config/capture";
export { enableDebugLogging } from "@/utils/debug";
export { default as formatDuration } from "@/utils/formatDuration";
