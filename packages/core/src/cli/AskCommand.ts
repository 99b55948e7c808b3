import { parseArgs } from "./CliArgs.js";
import { openCommandContext } from "./CommandContext.js";

export class AskCommand {
  static async run(argv: string[]): Promise<void> {
    const parsed = parseArgs(argv);
    const question = parsed.positionals.join(" ").trim();
    if (!question) {
      throw new Error("Usage: lectern ask <question...>");
    }
    const { system } = await openCommandContext(parsed, "ask");
    try {
      const result = await system.query(question);
      // eslint-disable-next-line no-console
      console.log(result.answer);
      if (result.sources.length) {
        // eslint-disable-next-line no-console
        console.log(
          ["", "Sources:", ...result.sources.map((source) => `- ${source.text}${source.link ? ` (${source.link})` : ""}`)].join(
            "\n",
          ),
        );
      }
    } finally {
      await system.close();
    }
  }
}
