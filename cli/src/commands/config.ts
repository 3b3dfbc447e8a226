import { loadConfig, resolveConfig, saveConfig, CONFIG_FILE } from "../lib/config.js";
import { fmt } from "../lib/format.js";

export function configCommand(options: { url?: string; token?: string }): void {
  if (options.url === undefined && options.token === undefined) {
    const resolved = resolveConfig();
    console.log(fmt.label("API URL:     ", resolved.apiUrl));
    console.log(fmt.label("Admin token: ", resolved.adminToken ? "set" : "not set"));
    console.log(fmt.label("Config file: ", CONFIG_FILE));
    return;
  }

  const current = loadConfig() ?? {};
  saveConfig({
    ...current,
    ...(options.url !== undefined ? { apiUrl: options.url } : {}),
    ...(options.token !== undefined ? { adminToken: options.token } : {}),
    configuredAt: new Date().toISOString(),
  });
  console.log(fmt.success(`Saved ${CONFIG_FILE}`));
}
