import { command } from "cleye";
import type { Provider } from "../../provider/provider.js";
import { formatCheckReport, runCheck } from "../check.js";
import { formatDiagnostic } from "../format.js";

export const checkCommand = (provider: Provider) =>
  command(
    {
      name: "check",
      help: {
        description: "Check connectivity to Mimir using the MIMIR_* environment variables",
      },
    },
    async () => {
      const result = await runCheck(provider, process.env);
      if (result.isErr()) {
        for (const d of result.error) {
          console.error(formatDiagnostic(d));
        }
        process.exitCode = 1;
        return;
      }
      for (const d of result.value.diagnostics) {
        console.error(formatDiagnostic(d));
      }
      console.log(formatCheckReport(result.value));
    },
  );
