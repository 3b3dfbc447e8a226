import { validateKey } from "../lib/api.js";
import { resolveConfig } from "../lib/config.js";
import { fmt } from "../lib/format.js";

/**
 * Exit code 0 when the key is valid for the device, 2 when it is denied.
 */
export async function validateCommand(key: string, deviceId: string): Promise<void> {
  const result = await validateKey(resolveConfig(), key, deviceId);

  if (result.valid) {
    console.log(fmt.success(result.message));
    return;
  }

  console.log(fmt.error(`${result.message} (HTTP ${result.status})`));
  process.exitCode = 2;
}
