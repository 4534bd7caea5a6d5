export const APP_NAME = "mcpgw";
export const APP_VERSION = "0.4.0";
