import { command } from "cleye";
import type { Provider } from "../../provider/provider.js";
import { renderSchema } from "../schema.js";

export const schemaCommand = (provider: Provider) =>
  command(
    {
      name: "schema",
      help: {
        description: "Print the provider schema as JSON",
      },
    },
    () => {
      console.log(renderSchema(provider));
    },
  );
