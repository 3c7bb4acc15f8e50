import type { SettingsOverrides } from "./config/settings.js";

/** Flags that must be followed by a value, inline (`--port=80`) or as the next argument. */
const FLAG_WITH_VALUE = new Set(["--config", "--host", "--port"]);

function parsePort(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65_535) {
    throw new Error(`${flag} expects a port between 0 and 65535, got "${value}"`);
  }
  return parsed;
}

/**
 * Parses the CLI arguments (`process.argv.slice(2)`) into settings
 * overrides. Unknown flags and positional arguments are ignored.
 */
export function parseServerOptions(argv: readonly string[]): SettingsOverrides {
  const overrides: SettingsOverrides = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator >= 0 ? arg.slice(0, separator) : arg;
    if (!FLAG_WITH_VALUE.has(flag)) {
      continue;
    }

    let value = separator >= 0 ? arg.slice(separator + 1) : "";
    if (value === "") {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`${flag} requires a value`);
      }
      value = next;
      index += 1;
    }
    value = value.trim();

    switch (flag) {
      case "--config":
        if (!value) {
          throw new Error("--config cannot be empty");
        }
        overrides.tabsConfigPath = value;
        break;
      case "--host":
        if (!value) {
          throw new Error("--host cannot be empty");
        }
        overrides.host = value;
        break;
      case "--port":
        overrides.port = parsePort(value, flag);
        break;
    }
  }

  return overrides;
}
