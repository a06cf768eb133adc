import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

function field(err: unknown, key: "stdout" | "stderr" | "code"): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  return Reflect.get(err, key);
}

// Arguments go straight to the binary; no shell quoting involved.
export async function runCommand(
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number; signal?: AbortSignal }
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      timeout: options?.timeoutMs,
      signal: options?.signal,
      encoding: "utf8",
      maxBuffer: 16 * 1024 * 1024,
    });
    return { stdout, stderr, exitCode: 0 };
  } catch (err) {
    const stdout = String(field(err, "stdout") ?? "");
    const stderr = String(field(err, "stderr") ?? (err instanceof Error ? err.message : ""));
    const code = field(err, "code");
    const exitCode = typeof code === "number" ? code : 1;
    throw new Error(
      `Command failed (${command} ${args.join(" ")}): code=${exitCode}\nSTDERR: ${stderr}\nSTDOUT: ${stdout}`,
      { cause: err }
    );
  }
}
