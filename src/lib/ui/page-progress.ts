import chalk from "chalk";
import type { PageProgress } from "../utils/paginate";

/**
 * Report a fetched page on stderr so stdout stays the table
 */
export function renderPageProgress(progress: PageProgress): void {
  console.error(
    chalk.dim(
      `  Fetched page ${progress.page} (${progress.collected} item(s) so far)`,
    ),
  );
}
