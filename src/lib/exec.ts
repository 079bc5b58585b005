import logger, { colorize } from "./logger";
import { type ChildProcessByStdio, spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { quote } from "shell-quote";

export interface ActionResult {
    result: "success" | "error" | "script";
    error?: Error | number | undefined;
    message: string;
    output: string;
}

export type LevelFn = (stdio: "stdout" | "stderr", message: string) => string;

export interface ExecOptions {
    cwd?: string;
    stdinText?: string;
    stderrAsInfo?: boolean;
    errorAsWarn?: boolean;
    captureStdout?: boolean;
    commandLevel?: string;
    levelFn?: LevelFn;
}

/**
 * Instruments a stream with data and end event handlers for line-by-line processing
 * @param stream The stream to instrument (stdout or stderr)
 * @param logFn The logging function to use for each line
 * @param dataCallback Optional callback for additional processing of data
 */
function instrumentStream(
    stream: NodeJS.ReadableStream | null,
    logFn: (line: string) => void,
    dataCallback?: (data: Buffer) => void
): void {
    if (!stream) return;

    let buffer = '';

    const processStreamData = (data: Buffer, buffer: string): string => {
        const lines = (buffer + data.toString()).split(/\r?\n/);
        const newBuffer = lines.pop() || '';

        for (const line of lines) {
            if (line) {
                logFn(line);
            }
        }

        return newBuffer;
    };

    stream.on('data', (data: Buffer) => {
        if (dataCallback) {
            dataCallback(data);
        }
        buffer = processStreamData(data, buffer);
    });

    stream.on('end', () => {
        if (buffer) {
            logFn(buffer);
        }
    });
}

export async function exec(executable: string, ...args: string[]): Promise<ActionResult> {
    return await execOpt({}, executable, ...args);
}

function defaultStderrWarnLevelFn(stdio: "stdout" | "stderr") {
    switch (stdio) {
        case "stderr":
            return "warn";
        default:
            return "info";
    }
}

function defaultAllInfoLevelFn() {
    return "info";
}

export async function execOpt(opts: ExecOptions, executable: string, ...args: string[]): Promise<ActionResult> {
    logger.log(opts.commandLevel ?? "info",
        `[${ executable }] Executing: ${ quote([executable, ...args]) }${ opts.cwd ? ` in ${ opts.cwd }` : "" }`);

    let child: ChildProcessByStdio<Writable | null, Readable, Readable> | null = null;
    let spawnError: Error | null = null;
    let scriptStderr = '';
    let scriptStdout = '';
    const loggerError = opts.errorAsWarn ? logger.warn.bind(logger) : logger.error.bind(logger);

    try {
        child = spawn(executable, args, {
            cwd: opts.cwd,
            stdio: [opts.stdinText ? 'pipe' : 'ignore', 'pipe', 'pipe'],
            detached: false
        }) as ChildProcessByStdio<Writable | null, Readable, Readable>;
    } catch (err) {
        loggerError(`[${ executable }] Failed to run executable:`, { err });
        spawnError = err instanceof Error ? err : new Error(String(err));
    }

    if (!child) {
        return {
            result: "error",
            error: spawnError ?? undefined,
            message: scriptStderr,
            output: scriptStdout,
        };
    }

    const runningChild = child;
    const levelFn = opts.levelFn ?? (opts.stderrAsInfo ? defaultAllInfoLevelFn : defaultStderrWarnLevelFn);

    instrumentStream(
        runningChild.stdout,
        (line) => {
            const level = levelFn("stdout", line);
            logger.log(level, `[${ executable } ${ colorize.colorize(level, "stdout") }]: ${ line }`)
        },
        opts.captureStdout ? (data) => scriptStdout += data.toString() : undefined
    );

    instrumentStream(
        runningChild.stderr,
        (line) => {
            const level = levelFn("stderr", line);
            logger.log(level, `[${ executable } ${ colorize.colorize(level, "stderr") }]: ${ line }`)
        },
        (data) => scriptStderr += data.toString()
    );

    if (opts.stdinText) {
        runningChild.stdin?.write(opts.stdinText);
        runningChild.stdin?.end();
    }

    await new Promise<void>((resolve) => {
        runningChild.on('error', (err) => {
            loggerError(`[${ executable }] Failed to run executable:`, { err });
            spawnError = err;
        });

        runningChild.on('close', (code) => {
            if (code !== null && ((!spawnError && code !== 0) || logger.isDebugEnabled())) {
                logger.log(code ? "warn" : "debug", `[${ executable }] Execution finished with exit code: ${ code }`);
            }
            resolve();
        });
    });

    const exitCode = runningChild.exitCode;
    return {
        result: spawnError ? "error" : exitCode === 0 ? "success" : "script",
        error: spawnError ?? (exitCode !== 0 && exitCode !== null ? exitCode : undefined),
        message: scriptStderr,
        output: scriptStdout,
    };
}

/**
 * Turns a failed {@link ActionResult} into a readable reason.
 */
export function describeFailure(result: ActionResult): string {
    if (result.error instanceof Error) {
        return result.error.message;
    }
    const stderr = result.message.trim();
    const code = result.error !== undefined ? `exit code ${ result.error }` : "terminated by signal";
    return stderr ? `${ code }: ${ stderr.split(/\r?\n/).pop() }` : code;
}
