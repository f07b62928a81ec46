import { loadConfig, type Config } from "@loadtrace/config";

export const config = loadConfig();
export type { Config };
