import type { Provider } from "../provider/provider.js";

export const renderSchema = (provider: Provider): string =>
  JSON.stringify(provider.providerSchema(), null, 2);
