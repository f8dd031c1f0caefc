import { createInterface } from "node:readline";

/**
 * Ask a question on `output` and read one line from `input`, untrimmed.
 * Resolves to "" if input ends before a line arrives.
 */
export async function askLine(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): Promise<string> {
  const rl = createInterface({ input, output });

  try {
    return await new Promise<string>((resolve) => {
      rl.once("line", resolve);
      rl.once("close", () => resolve(""));
      rl.setPrompt(question);
      rl.prompt();
    });
  } finally {
    rl.close();
  }
}
