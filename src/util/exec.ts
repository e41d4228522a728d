import { spawn } from "node:child_process";
import { log } from "./log";

export interface ExecResult {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export const execFile = async (
  file: string,
  args: string[],
  opts?: {
    timeoutMs?: number;
    inputText?: string;
    env?: NodeJS.ProcessEnv;
  },
): Promise<ExecResult> => {
  const timeoutMs = opts?.timeoutMs ?? 60_000;
  return await new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(file, args, {
      env: { ...process.env, ...(opts?.env ?? {}) },
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      log.warn("exec timeout, killing process", { file, timeoutMs });
      child.kill("SIGKILL");
    }, timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (d: string) => (stdout += d));
    child.stderr.on("data", (d: string) => (stderr += d));

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({ code: code ?? (timedOut ? 137 : 0), stdout, stderr, timedOut });
    });

    // The child may exit before reading stdin (e.g. a missing module).
    child.stdin.on("error", (err) => {
      log.debug("exec stdin closed early", { file, error: err.message });
    });
    if (opts?.inputText) {
      child.stdin.write(opts.inputText);
    }
    child.stdin.end();
  });
};
