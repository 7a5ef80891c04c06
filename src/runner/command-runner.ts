import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export const MAX_OUTPUT_BUFFER = 64 * 1024 * 1024; // 64MB

export type RunOptions = {
  cwd: string;
  /** Merged over the orchestrator's own environment. */
  env: Readonly<Record<string, string>>;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type CommandOutcome = {
  /** null when the process never started or was killed. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  aborted: boolean;
};

/**
 * Tool invocation boundary. The orchestrator only looks at exit status,
 * the two output streams and elapsed time.
 */
export interface CommandRunner {
  run(argv: readonly string[], opts: RunOptions): Promise<CommandOutcome>;
}

/** Build the argv that runs `script` under `shell`. */
export function shellArgv(shell: string, script: string): string[] {
  const base = shell.split(/[\\/]/).pop()?.toLowerCase().replace(/\.exe$/, "") ?? shell;
  switch (base) {
    case "bash":
      return [shell, "--noprofile", "--norc", "-eo", "pipefail", "-c", script];
    case "pwsh":
    case "powershell":
      return [shell, "-NoProfile", "-NonInteractive", "-Command", script];
    case "cmd":
      return [shell, "/d", "/s", "/c", script];
    default:
      return [shell, "-e", "-c", script];
  }
}

/**
 * CommandRunner backed by child_process.execFile with no intermediate shell,
 * output captured in full.
 */
export class ExecFileCommandRunner implements CommandRunner {
  async run(argv: readonly string[], opts: RunOptions): Promise<CommandOutcome> {
    const [file, ...args] = argv;
    if (!file) {
      throw new Error("Command cannot be empty");
    }

    const start = Date.now();
    try {
      const { stdout, stderr } = await pExecFile(file, args, {
        cwd: opts.cwd,
        env: { ...process.env, ...opts.env },
        timeout: opts.timeoutMs ?? 0,
        signal: opts.signal,
        maxBuffer: MAX_OUTPUT_BUFFER,
        windowsHide: true,
        encoding: "utf8",
      });
      return { exitCode: 0, stdout, stderr, durationMs: Date.now() - start, timedOut: false, aborted: false };
    } catch (e: unknown) {
      const durationMs = Date.now() - start;
      const failure = readExecFailure(e);
      const aborted = opts.signal?.aborted === true || failure.name === "AbortError";
      const timedOut = !aborted && failure.killed && opts.timeoutMs !== undefined && opts.timeoutMs > 0;
      return {
        exitCode: typeof failure.code === "number" ? failure.code : null,
        stdout: failure.stdout,
        stderr: failure.stderr.length > 0 ? failure.stderr : failure.message,
        durationMs,
        timedOut,
        aborted,
      };
    }
  }
}

type ExecFailure = {
  name: string;
  message: string;
  code: unknown;
  killed: boolean;
  stdout: string;
  stderr: string;
};

function readExecFailure(e: unknown): ExecFailure {
  if (typeof e !== "object" || e === null) {
    return { name: "Error", message: String(e), code: undefined, killed: false, stdout: "", stderr: "" };
  }
  return {
    name: "name" in e && typeof e.name === "string" ? e.name : "Error",
    message: "message" in e && typeof e.message === "string" ? e.message : String(e),
    code: "code" in e ? e.code : undefined,
    killed: "killed" in e && e.killed === true,
    stdout: "stdout" in e && typeof e.stdout === "string" ? e.stdout : "",
    stderr: "stderr" in e && typeof e.stderr === "string" ? e.stderr : "",
  };
}
