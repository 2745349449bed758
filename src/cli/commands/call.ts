import { text } from "node:stream/consumers";
import { command } from "cleye";
import type { Provider } from "../../provider/provider.js";
import { runCall } from "../call.js";

export const callCommand = (provider: Provider) =>
  command(
    {
      name: "call",
      help: {
        description: "Run one resource operation read as JSON from stdin",
      },
    },
    async () => {
      const input = await text(process.stdin);
      const response = await runCall({ provider, input, env: process.env });
      console.log(JSON.stringify(response, null, 2));
      if (!response.ok) {
        process.exitCode = 1;
      }
    },
  );
