import { existsSync } from "node:fs";
import { ApiServer } from "../api/ApiServer.js";
import { parseArgs } from "./CliArgs.js";
import { openCommandContext } from "./CommandContext.js";

export class ServeCommand {
  static async run(argv: string[]): Promise<void> {
    const parsed = parseArgs(argv);
    const { config, logger, system } = await openCommandContext(parsed, "serve");
    const docsPath = config.ingestion.docsPath;
    if (!parsed.noIngest && existsSync(docsPath)) {
      const result = await system.addCourseFolder(docsPath);
      // eslint-disable-next-line no-console
      console.log(`Loaded ${result.courses} courses with ${result.chunks} chunks`);
    }

    const server = new ApiServer(system, { logger });
    const address = await server.listen(config.server.port, config.server.host);
    // eslint-disable-next-line no-console
    console.log(`Lectern listening on http://${address.address}:${address.port}`);

    const shutdown = (): void => {
      server
        .close()
        .then(() => system.close())
        .catch((error: unknown) => {
          // eslint-disable-next-line no-console
          console.error(error instanceof Error ? error.message : String(error));
          process.exitCode = 1;
        });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  }
}
