import { cli } from "cleye";
import { createProvider } from "../provider/provider.js";
import { callCommand } from "./commands/call.js";
import { checkCommand } from "./commands/check.js";
import { schemaCommand } from "./commands/schema.js";

export const VERSION = "0.1.0";

export const run = (argv: readonly string[]): void => {
  const provider = createProvider({ version: VERSION });

  cli(
    {
      name: "tf-mimirtool",
      version: VERSION,
      commands: [schemaCommand(provider), callCommand(provider), checkCommand(provider)],
    },
    (parsed) => {
      parsed.showHelp();
    },
    [...argv.slice(2)],
  );
};
