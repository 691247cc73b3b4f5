import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | string;
  readonly stderr: string;
  readonly stdout: string;

  constructor(command: string, args: string[], exitCode: number | string, stderr: string, stdout: string) {
    super(`Command failed (${command} ${args.join(" ")}): code=${exitCode}\nSTDERR: ${stderr}\nSTDOUT: ${stdout}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.stdout = stdout;
  }
}

export async function runCommand(
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number; env?: Record<string, string> }
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      encoding: "utf8",
      maxBuffer: 16 * 1024 * 1024,
    });
    return { stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    const detail = isExecError(err) ? err : {};
    const stdout = String(detail.stdout ?? "");
    const stderr = String(detail.stderr ?? (err instanceof Error ? err.message : ""));
    // ENOENT and friends come through as string codes
    const exitCode = typeof detail.code === "number" || typeof detail.code === "string" ? detail.code : 1;
    throw new CommandError(command, args, exitCode, stderr, stdout);
  }
}

interface ExecErrorDetail {
  code?: unknown;
  stdout?: unknown;
  stderr?: unknown;
}

function isExecError(err: unknown): err is ExecErrorDetail {
  return typeof err === "object" && err !== null;
}
