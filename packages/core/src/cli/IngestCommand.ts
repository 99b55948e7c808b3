import path from "node:path";
import { parseArgs } from "./CliArgs.js";
import { openCommandContext } from "./CommandContext.js";

export class IngestCommand {
  static async run(argv: string[]): Promise<void> {
    const parsed = parseArgs(argv);
    const { config, system } = await openCommandContext(parsed, "ingest");
    try {
      const folder = parsed.positionals[0]
        ? path.resolve(config.workspaceRoot, parsed.positionals[0])
        : config.ingestion.docsPath;
      const result = await system.addCourseFolder(folder, parsed.clear ?? false);
      // eslint-disable-next-line no-console
      console.log(`Added ${result.courses} courses with ${result.chunks} chunks from ${folder}`);
    } finally {
      await system.close();
    }
  }
}
