import { createInterface } from "readline/promises";

/**
 * Asks the invoking user a question and resolves with the raw answer
 */
export type Prompt = (question: string) => Promise<string>;

export interface ReadlinePromptOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    /** An unanswered question resolves to "" after this long, 0 waits forever */
    timeoutMs?: number;
}

export function createReadlinePrompt(
    options: ReadlinePromptOptions = {},
): Prompt {
    const input = options.input ?? process.stdin;
    const output = options.output ?? process.stdout;
    const timeoutMs = options.timeoutMs ?? 0;

    return async (question) => {
        const rl = createInterface({ input, output, terminal: false });
        // Input ending before an answer (stdin at EOF) reads as ""
        let inputEnded = false;
        const closed = new Promise<string>((resolve) => {
            rl.once("close", () => {
                inputEnded = true;
                resolve("");
            });
        });

        const controller = new AbortController();
        const timer =
            timeoutMs > 0
                ? setTimeout(() => controller.abort(), timeoutMs)
                : undefined;

        try {
            const answer = rl.question(question, {
                signal: controller.signal,
            });
            const result = await Promise.race([answer, closed]);
            if (inputEnded) output.write("\n");
            return result;
        } catch (e) {
            if (isAbort(e)) {
                output.write("\n");
                return "";
            }
            throw e;
        } finally {
            clearTimeout(timer);
            rl.close();
        }
    };
}

function isAbort(e: unknown): boolean {
    return (
        typeof e === "object" &&
        e !== null &&
        "name" in e &&
        e.name === "AbortError"
    );
}

export function isAffirmative(answer: string): boolean {
    return /^y(es)?$/i.test(answer.trim());
}
