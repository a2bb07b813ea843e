import { Command } from "commander";
import { configureCommand } from "./commands/configure";
import { listCommand } from "./commands/list";
import { infoCommand } from "./commands/info";

declare const __CLI_VERSION__: string;

const program = new Command();

program
  .name("camper")
  .description("List the albums in a Bandcamp collection or wishlist")
  .version(__CLI_VERSION__);

program.addCommand(configureCommand);
program.addCommand(listCommand);
program.addCommand(infoCommand);

export { program };

if (
  process.argv[1]?.endsWith("index.js") ||
  process.argv[1]?.endsWith("index.ts") ||
  process.argv[1]?.endsWith("camper")
) {
  await program.parseAsync();
}
