/**
 * Media pipeline — External tool execution
 *
 * Thin wrapper around `execFile` for yt-dlp, ffmpeg and ffprobe. Arguments are
 * passed as an array (never through a shell) and every call carries a timeout.
 * Components receive a {@link ToolRunner} so tests can stand in for the
 * subprocess layer.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

// yt-dlp --dump-single-json can print several MB for long VODs
const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs: number;
}

export type ToolRunner = (bin: string, args: string[], options: RunOptions) => Promise<ExecResult>;

function readStderr(err: unknown): string {
  if (typeof err === "object" && err !== null && "stderr" in err) {
    const { stderr } = err;
    if (typeof stderr === "string" && stderr.trim()) return stderr.trim();
  }
  return "N/A";
}

/**
 * Run `bin` with `args`. Rejects with an Error carrying the tool name, the
 * exit message and captured stderr on non-zero exit or timeout.
 */
export const runTool: ToolRunner = async (bin, args, options) => {
  try {
    const result = await execFileAsync(bin, args, {
      maxBuffer: MAX_BUFFER_BYTES,
      timeout: options.timeoutMs,
      encoding: "utf8",
    });
    return { stdout: result.stdout, stderr: result.stderr };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${bin} failed: ${message}\nstderr: ${readStderr(error)}`, { cause: error });
  }
};

/**
 * Runtime availability check for the external tools; used at startup to
 * report a misconfigured host early.
 */
export async function checkToolsAvailable(
  tools: { ffmpeg: string; ffprobe: string; ytdlp: string },
  runner: ToolRunner = runTool
): Promise<{ ffmpeg: boolean; ffprobe: boolean; ytdlp: boolean }> {
  const check = async (bin: string, versionFlag: string) => {
    try {
      await runner(bin, [versionFlag], { timeoutMs: 5000 });
      return true;
    } catch {
      return false;
    }
  };

  return {
    ffmpeg: await check(tools.ffmpeg, "-version"),
    ffprobe: await check(tools.ffprobe, "-version"),
    ytdlp: await check(tools.ytdlp, "--version"),
  };
}
