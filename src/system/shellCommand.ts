import { spawn, type ChildProcess } from "node:child_process";
import type { Readable } from "node:stream";
import makeDebug from "@/utils/debug";

export type SpawnOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  // Pipe stdout instead of discarding it.
  captureStdout?: boolean;
};

export type ExitStatus = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

// Exclusive handle on a spawned process. Only the code that spawned it should hold one.
export type ProcessHandle = {
  pid: number | undefined;
  stdout: Readable | null;
  stderr: Readable | null;
  // Asks the process to finish cleanly (SIGINT, or "q" on stdin where signals are not delivered).
  interrupt: () => boolean;
  // SIGKILL.
  terminate: () => boolean;
  hasExited: () => boolean;
  // Resolves once the process has exited and its stdio has closed.
  wait: () => Promise<ExitStatus>;
};

export type SpawnProcess = (
  program: string,
  args: string[],
  options?: SpawnOptions
) => Promise<ProcessHandle>;

export type CommandOutput = ExitStatus & {
  stdout: string;
  stderr: string;
};

export type ExecuteCommand = (
  program: string,
  args: string[],
  options?: SpawnOptions
) => Promise<CommandOutput>;

const debug = makeDebug("system:shell");

const isWindows = () => process.platform === "win32";

const createHandle = (child: ChildProcess): ProcessHandle => {
  const closed = new Promise<ExitStatus>((resolve) => {
    child.once("close", (code, signal) => {
      debug("pid %s closed: code=%s signal=%s", child.pid, code, signal);
      resolve({ code, signal });
    });
  });

  const hasExited = () => child.exitCode !== null || child.signalCode !== null;

  return {
    pid: child.pid,
    stdout: child.stdout,
    stderr: child.stderr,
    interrupt: () => {
      if (hasExited()) {
        return false;
      }
      if (isWindows()) {
        // Windows has no SIGINT for child processes; ffmpeg treats "q" as a clean stop.
        const stdin = child.stdin;
        if (!stdin || stdin.destroyed) {
          return false;
        }
        stdin.write("q\n");
        return true;
      }
      return child.kill("SIGINT");
    },
    terminate: () => (hasExited() ? false : child.kill("SIGKILL")),
    hasExited,
    wait: () => closed
  };
};

// Spawns a program and resolves once the OS has started it. Rejects with the spawn error (ENOENT, EACCES, ...).
export const spawnCommand: SpawnProcess = (program, args, options = {}) =>
  new Promise((resolve, reject) => {
    debug("spawn %s %o", program, args);
    let child: ChildProcess;
    try {
      child = spawn(program, args, {
        cwd: options.cwd,
        env: options.env,
        windowsHide: true,
        stdio: [
          isWindows() ? "pipe" : "ignore",
          options.captureStdout ? "pipe" : "ignore",
          "pipe"
        ]
      });
    } catch (error) {
      reject(error);
      return;
    }

    const onSpawnError = (error: Error) => {
      debug("%s spawn failed: %O", program, error);
      reject(error);
    };

    child.once("error", onSpawnError);
    child.once("spawn", () => {
      child.off("error", onSpawnError);
      // Later errors (failed kill, broken stdin) must not crash the host.
      child.on("error", (error) => {
        debug("%s process error: %O", program, error);
      });
      child.stdin?.on("error", (error) => {
        debug("%s stdin error: %O", program, error);
      });
      resolve(createHandle(child));
    });
  });

const collect = (stream: Readable | null, chunks: Buffer[]) => {
  stream?.on("data", (chunk: Buffer | string) => {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  });
};

// Runs a program to completion and returns its exit status with both output streams.
export const executeCommand: ExecuteCommand = async (program, args, options = {}) => {
  const handle = await spawnCommand(program, args, { ...options, captureStdout: true });
  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  collect(handle.stdout, stdout);
  collect(handle.stderr, stderr);
  const status = await handle.wait();
  return {
    ...status,
    stdout: Buffer.concat(stdout).toString("utf8"),
    stderr: Buffer.concat(stderr).toString("utf8")
  };
};
