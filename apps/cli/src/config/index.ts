import { getConfigFromCli } from "./arg-parser.js";
import type { ModlinkConfig } from "./types.js";

let config: ModlinkConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
