import { ConfigurationError } from "./errors";
import type { StoreKind } from "./storage";

export interface RuntimeSettings {
  botToken: string;
  storageKind: StoreKind;
  databaseUrl?: string;
}

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

function storageKindOf(processEnv: NodeJS.ProcessEnv): string {
  return processEnv.STORAGE_DRIVER?.trim() || "postgres";
}

/** Returns one human-readable problem per invalid or missing variable. */
export function validateRuntimeEnv(processEnv: NodeJS.ProcessEnv): string[] {
  const errors: string[] = [];

  if (isBlank(processEnv.TELEGRAM_BOT_TOKEN)) {
    errors.push("TELEGRAM_BOT_TOKEN is not set");
  }

  const storageKind = storageKindOf(processEnv);
  if (storageKind !== "postgres" && storageKind !== "memory") {
    errors.push(`STORAGE_DRIVER=${storageKind} is invalid, expected postgres or memory`);
  }

  if (storageKind === "postgres") {
    const databaseUrl = processEnv.DATABASE_URL?.trim();
    if (!databaseUrl) {
      errors.push("DATABASE_URL is required when STORAGE_DRIVER=postgres");
    } else if (!/^postgres(ql)?:\/\//.test(databaseUrl)) {
      errors.push("DATABASE_URL must start with postgres:// or postgresql://");
    }
  }

  const port = processEnv.PORT?.trim();
  if (port) {
    if (!/^\d+$/.test(port)) {
      errors.push(`PORT=${port} is not a number`);
    } else if (Number(port) < 1 || Number(port) > 65535) {
      errors.push(`PORT=${port} is out of range 1-65535`);
    }
  }

  return errors;
}

export function assertRuntimeEnv(processEnv: NodeJS.ProcessEnv): RuntimeSettings {
  const errors = validateRuntimeEnv(processEnv);
  if (errors.length > 0) {
    throw new ConfigurationError(
      ["Environment check failed:", ...errors.map((item) => `- ${item}`)].join("\n"),
      { errors }
    );
  }

  const storageKind: StoreKind = storageKindOf(processEnv) === "memory" ? "memory" : "postgres";
  return {
    botToken: (processEnv.TELEGRAM_BOT_TOKEN ?? "").trim(),
    storageKind,
    databaseUrl: storageKind === "postgres" ? processEnv.DATABASE_URL?.trim() : undefined,
  };
}
