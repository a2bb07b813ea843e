import { Command } from "commander";
import chalk from "chalk";
import { listItems, type ResourceKind } from "../../lib/api";
import { parsePositiveInteger, withErrorHandler } from "../../lib/command";
import {
  ConfigError,
  MISSING_CONFIG_MESSAGE,
  isConfigValid,
  resolveConfig,
} from "../../lib/config";
import { renderItemTable } from "../../lib/ui/item-table";
import { renderPageProgress } from "../../lib/ui/page-progress";

interface ListCommandOptions {
  fanId?: number;
  wishlist?: boolean;
  timeout?: number;
}

export const listCommand = new Command()
  .name("list")
  .alias("ls")
  .description("List all albums in a collection or wishlist")
  .option(
    "-f, --fan-id <id>",
    "ID of the user whose collection items to list",
    parsePositiveInteger,
  )
  .option("-w, --wishlist", "List items from the wishlist instead")
  .option(
    "-t, --timeout <seconds>",
    "Give up if listing takes longer than this",
    parsePositiveInteger,
  )
  .action(
    withErrorHandler(async (options: ListCommandOptions) => {
      const config = await resolveConfig();
      if (!isConfigValid(config)) {
        throw new ConfigError(MISSING_CONFIG_MESSAGE);
      }

      // Another fan's ID may be given; the configured identity is still
      // sent so private items show up for the logged-in fan.
      const fanId = options.fanId ?? config.fanId;
      const kind: ResourceKind = options.wishlist ? "wishlist" : "collection";
      const signal =
        options.timeout === undefined
          ? undefined
          : AbortSignal.timeout(options.timeout * 1000);

      const items = await listItems(kind, fanId, {
        identity: config.identity,
        signal,
        onPage: renderPageProgress,
      });

      if (items.length === 0) {
        console.log(chalk.dim(`No items found in ${kind}`));
        return;
      }

      renderItemTable(items);
      console.log();
      console.log(chalk.dim(`${items.length} item(s)`));
    }),
  );
