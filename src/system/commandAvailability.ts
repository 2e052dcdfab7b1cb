import { executeCommand, type ExecuteCommand } from "@/system/shellCommand";
import makeDebug from "@/utils/debug";

const debug = makeDebug("system:which");

type AvailabilityOptions = {
  platform?: NodeJS.Platform;
  execute?: ExecuteCommand;
};

export type AvailabilityCheck = (toolName: string) => Promise<boolean>;

// Asks the OS path lookup (`which`/`where`) for a tool. Never rejects.
export const isCommandAvailable = async (
  toolName: string,
  options: AvailabilityOptions = {}
) => {
  const name = toolName.trim();
  if (!name) {
    return false;
  }
  const platform = options.platform ?? process.platform;
  const execute = options.execute ?? executeCommand;
  const lookup = platform === "win32" ? "where" : "which";
  try {
    const output = await execute(lookup, [name]);
    debug("%s %s: code=%s", lookup, name, output.code);
    return output.code === 0;
  } catch (error) {
    debug("%s %s failed: %O", lookup, name, error);
    return false;
  }
};
