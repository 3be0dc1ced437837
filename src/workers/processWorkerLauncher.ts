import path from "node:path";
import { spawn } from "node:child_process";
import { mkdir, open, type FileHandle } from "node:fs/promises";
import { z } from "zod";
import { describeError, WorkerLaunchError, WorkerRequestError } from "../errors.js";
import type {
  TerminationMode,
  WorkerHandle,
  WorkerLaunchRequest,
  WorkerLauncher,
  WorkerResult,
} from "./workerHandle.js";

const EXIT_MARKER = "__WORKER_EXIT__:";
const DEFAULT_CAPTURE_LIMIT = 2 * 1024 * 1024;
// Linux MAX_ARG_STRLEN, terminating NUL included.
export const MAX_ARGUMENT_BYTES = 128 * 1024;
const TRAILER_ROOM = 64;

// Runs the worker command, then appends its exit status so a finished run can
// be told apart from one that was killed.
const WRAPPER_SCRIPT = `"$@"; status=$?; printf '\\n%s%s\\n' '${EXIT_MARKER}' "$status"; exit "$status"`;

const HandleIdSchema = z.object({
  pid: z.number().int().positive(),
  log: z.string().min(1).nullable(),
});

function formatTimestamp(date: Date = new Date()): string {
  const pad = (value: number) => value.toString().padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(
    date.getMinutes(),
  )}:${pad(date.getSeconds())}`;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") return error.code;
  return undefined;
}

export class ProcessWorkerHandle implements WorkerHandle {
  readonly id: string;

  constructor(
    readonly pid: number,
    readonly logPath: string | null,
    private readonly captureLimit: number = DEFAULT_CAPTURE_LIMIT,
  ) {
    this.id = JSON.stringify({ pid, log: logPath });
  }

  isAlive(): boolean {
    try {
      process.kill(this.pid, 0);
      return true;
    } catch (error) {
      // EPERM: the process exists but belongs to someone else.
      return errorCode(error) === "EPERM";
    }
  }

  terminate(mode: TerminationMode) {
    const signal = mode === "graceful" ? "SIGTERM" : "SIGKILL";
    try {
      process.kill(-this.pid, signal);
      return;
    } catch (error) {
      if (errorCode(error) !== "ESRCH") throw error;
    }
    try {
      process.kill(this.pid, signal);
    } catch (error) {
      if (errorCode(error) !== "ESRCH") throw error;
    }
  }

  async collect(): Promise<WorkerResult | null> {
    if (!this.logPath) return null;

    const content = await this.readTail(this.logPath);
    if (content === null) return null;

    const exits = [...content.matchAll(new RegExp(`^${EXIT_MARKER}(\\d+)$`, "gm"))];
    const last = exits.at(-1);
    if (!last || last.index === undefined) return null;

    const output = content.slice(0, last.index);
    return {
      exitCode: Number(last[1]),
      output: output.length > this.captureLimit ? output.slice(output.length - this.captureLimit) : output,
    };
  }

  /** Last `captureLimit` bytes of the log plus room for the exit trailer. */
  private async readTail(logPath: string): Promise<string | null> {
    let file: FileHandle;
    try {
      file = await open(logPath, "r");
    } catch (error) {
      if (errorCode(error) === "ENOENT") return null;
      throw error;
    }

    try {
      const { size } = await file.stat();
      const length = Math.min(size, this.captureLimit + TRAILER_ROOM);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await file.read(buffer, 0, length, size - length);
      return buffer.subarray(0, bytesRead).toString("utf8");
    } finally {
      await file.close();
    }
  }
}

export interface ProcessWorkerLauncherOptions {
  /** Program and leading arguments, e.g. ["openclaw", "agent"]. */
  command: string[];
  logDir: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  captureLimit?: number;
}

/**
 * Starts each worker as a detached process group whose combined output lands
 * in `<logDir>/task-<id>-<role>.log`. The dispatcher may exit while workers
 * keep running; later passes re-attach through the serialized handle id.
 */
export class ProcessWorkerLauncher implements WorkerLauncher {
  private readonly command: string[];
  private readonly logDir: string;
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly captureLimit: number;

  constructor(options: ProcessWorkerLauncherOptions) {
    if (options.command.length === 0) {
      throw new WorkerLaunchError("Worker command is empty");
    }
    this.command = options.command;
    this.logDir = path.resolve(options.logDir);
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
    this.captureLimit = options.captureLimit ?? DEFAULT_CAPTURE_LIMIT;
  }

  logPathFor(request: Pick<WorkerLaunchRequest, "primaryTaskId" | "role">) {
    return path.join(this.logDir, `task-${request.primaryTaskId}-${request.role}.log`);
  }

  async launch(request: WorkerLaunchRequest): Promise<WorkerHandle> {
    const payloadBytes = Buffer.byteLength(request.payload, "utf8");
    if (payloadBytes >= MAX_ARGUMENT_BYTES) {
      throw new WorkerRequestError(
        `payload is ${payloadBytes} bytes, over the ${MAX_ARGUMENT_BYTES - 1}-byte limit for one worker argument`,
      );
    }

    const logPath = this.logPathFor(request);
    const args = [
      ...this.command,
      "--agent",
      request.agent,
      "--message",
      request.payload,
      "--timeout",
      String(request.timeoutSeconds),
    ];

    try {
      await mkdir(this.logDir, { recursive: true });
    } catch (error) {
      throw new WorkerLaunchError(`Cannot create worker log directory ${this.logDir}: ${describeError(error)}`, {
        cause: error,
      });
    }

    const header =
      `${formatTimestamp()} [task-${request.primaryTaskId}:${request.role}] starting agent ${request.agent}` +
      ` for tasks ${request.taskIds.join(", ")} (timeout ${request.timeoutSeconds}s)\n`;

    const log = await open(logPath, "w").catch((error: unknown) => {
      throw new WorkerLaunchError(`Cannot open worker log ${logPath}: ${describeError(error)}`, { cause: error });
    });

    try {
      await log.write(header);
      const child = spawn("sh", ["-c", WRAPPER_SCRIPT, "worker", ...args], {
        cwd: this.cwd,
        env: this.env,
        detached: true,
        stdio: ["ignore", log.fd, log.fd],
      });

      await new Promise<void>((resolve, reject) => {
        child.once("spawn", () => resolve());
        child.once("error", reject);
      });

      if (child.pid === undefined) {
        throw new Error("no pid assigned");
      }
      child.unref();
      return new ProcessWorkerHandle(child.pid, logPath, this.captureLimit);
    } catch (error) {
      if (errorCode(error) === "E2BIG") {
        throw new WorkerRequestError(`worker arguments are too long (${describeError(error)})`, { cause: error });
      }
      throw new WorkerLaunchError(
        `Failed to start ${request.role} worker for task ${request.primaryTaskId}: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      await log.close();
    }
  }

  attach(handleId: string): WorkerHandle | null {
    const trimmed = handleId.trim();
    // bare pids written by older schedulers have no output to collect
    if (/^\d+$/.test(trimmed)) {
      const pid = Number(trimmed);
      return pid > 0 ? new ProcessWorkerHandle(pid, null, this.captureLimit) : null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      return null;
    }
    const parsed = HandleIdSchema.safeParse(raw);
    if (!parsed.success) return null;
    return new ProcessWorkerHandle(parsed.data.pid, parsed.data.log, this.captureLimit);
  }
}
