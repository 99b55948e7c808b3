import { parseArgs } from "./CliArgs.js";
import { openCommandContext } from "./CommandContext.js";

export class CoursesCommand {
  static async run(argv: string[]): Promise<void> {
    const { system } = await openCommandContext(parseArgs(argv), "courses");
    try {
      const analytics = await system.getCourseAnalytics();
      const lines = [`Courses: ${analytics.totalCourses}`, ...analytics.courseTitles.map((title) => `- ${title}`)];
      // eslint-disable-next-line no-console
      console.log(lines.join("\n"));
    } finally {
      await system.close();
    }
  }
}
