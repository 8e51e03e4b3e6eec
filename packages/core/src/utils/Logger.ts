import chalk from "chalk";

export interface Logger {
    info(tag: string, message: string): void;
    success(tag: string, message: string): void;
    warn(tag: string, message: string): void;
}

/**
 * Status lines go to stderr, stdout belongs to the runtime being executed
 */
export function createLogger(
    stream: NodeJS.WritableStream = process.stderr,
): Logger {
    const write = (line: string) => {
        stream.write(line + "\n");
    };

    return {
        info: (tag, message) => write(chalk.yellow(`[${tag}] ${message}`)),
        success: (tag, message) => write(chalk.green(`[${tag}] ${message}`)),
        warn: (tag, message) => write(chalk.red(`[${tag}] ${message}`)),
    };
}

export const silentLogger: Logger = {
    info: () => {},
    success: () => {},
    warn: () => {},
};
