import { spawn } from "node:child_process";
import type { CommandToolDefinition, InputContext } from "@tooldeck/core";
import { ExecutorFailed } from "../../errors";
import { appendLogLine, logError } from "../../logging/server-log";
import { TemplateEngine } from "../../templates";
import { abortFailure } from "./deadline";
import { DEFAULT_TIMEOUT_MS, TemplatedExecutor } from "./executor-base";

const DEFAULT_KILL_GRACE_MS = 2_000;

export type CommandExecutorOptions = {
  templates?: TemplateEngine;
  defaultTimeoutMs?: number;
  /** Delay between SIGTERM and SIGKILL when an invocation is stopped. */
  killGraceMs?: number;
};

export type ProcessOutput = {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** True when the process was stopped because `signal` aborted. */
  killed: boolean;
};

/**
 * Spawn `command` without a shell and resolve once it has exited and its
 * output streams are closed. When `abort` fires the child gets SIGTERM,
 * then SIGKILL after `killGraceMs`.
 */
export function runProcess(
  command: string,
  args: string[],
  stdin: string | undefined,
  abort: AbortSignal,
  killGraceMs = DEFAULT_KILL_GRACE_MS
): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: [stdin === undefined ? "ignore" : "pipe", "pipe", "pipe"],
      windowsHide: true,
    });
    let stdout = "";
    let stderr = "";
    let killed = false;
    let escalation: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      killed = true;
      proc.kill("SIGTERM");
      escalation = setTimeout(() => proc.kill("SIGKILL"), killGraceMs);
    };
    const cleanup = () => {
      abort.removeEventListener("abort", onAbort);
      if (escalation) clearTimeout(escalation);
    };

    proc.stdout?.setEncoding("utf8");
    proc.stderr?.setEncoding("utf8");
    proc.stdout?.on("data", (d: string) => {
      stdout += d;
    });
    proc.stderr?.on("data", (d: string) => {
      stderr += d;
    });

    proc.on("error", (err) => {
      if (proc.pid === undefined) {
        cleanup();
        reject(new ExecutorFailed(`Cannot start ${command}: ${err.message}`, { cause: err }));
        return;
      }
      logError("command", "process-error", err);
    });
    proc.on("close", (exitCode, signal) => {
      cleanup();
      resolve({ stdout, stderr, exitCode, signal, killed });
    });

    if (abort.aborted) onAbort();
    else abort.addEventListener("abort", onAbort, { once: true });

    if (proc.stdin) {
      // a child that exits without reading its input makes the write fail with EPIPE
      proc.stdin.on("error", (err) => appendLogLine("command", "stdin-error", `${command}: ${err.message}`));
      proc.stdin.end(stdin);
    }
  });
}

export class CommandExecutor extends TemplatedExecutor<"command"> {
  readonly kind = "command";
  private readonly killGraceMs: number;

  constructor(options: CommandExecutorOptions = {}) {
    super(options.templates ?? new TemplateEngine(), options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  protected timeoutOf(tool: CommandToolDefinition) {
    return tool.commandMetadata.timeoutMs;
  }

  protected async perform(tool: CommandToolDefinition, input: InputContext, signal: AbortSignal): Promise<string> {
    const { command } = tool.commandMetadata;
    const args = tool.commandMetadata.args.map((template) => this.templates.render(template, input));
    const stdin =
      tool.commandMetadata.stdin !== undefined ? this.templates.render(tool.commandMetadata.stdin, input) : undefined;

    const out = await runProcess(command, args, stdin, signal, this.killGraceMs);
    if (out.killed) throw abortFailure(signal);
    if (out.exitCode === null) {
      throw new ExecutorFailed(`Command ${command} was terminated by ${out.signal ?? "a signal"}`, {
        signal: out.signal ?? undefined,
        stderr: out.stderr,
      });
    }
    if (out.exitCode !== 0) {
      throw new ExecutorFailed(`Command ${command} exited with code ${out.exitCode}`, {
        exitCode: out.exitCode,
        stderr: out.stderr,
      });
    }
    return out.stdout;
  }
}
