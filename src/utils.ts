export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const safeStringify = (value: unknown): string => {
  try {
    return String(value);
  } catch {
    return "[unserializable error]";
  }
};

export const formatError = (error: unknown): string => {
  const extractMessage = (candidate: unknown): string | undefined => {
    if (!candidate) return undefined;

    if (typeof candidate === "object" || typeof candidate === "function") {
      try {
        const message: unknown = Reflect.get(candidate, "message");
        if (typeof message === "string") {
          return message;
        }
      } catch (messageError) {
        return formatError(messageError);
      }
    }

    return undefined;
  };

  const message = extractMessage(error);
  if (message !== undefined) {
    return message;
  }

  return safeStringify(error);
};

export const serializeError = (value: unknown): { message: string; stack?: string } | string => {
  if (value instanceof Error) {
    return {
      message: formatError(value),
      stack: value.stack,
    };
  }

  return formatError(value);
};

const isSerializedError = (value: unknown): value is { message: string; stack?: string } =>
  isRecord(value) &&
  !(value instanceof Error) &&
  typeof value.message === "string" &&
  (value.stack === undefined || typeof value.stack === "string");

export const normalizeMeta = (meta?: Record<string, unknown>) => {
  if (!meta) return undefined;
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (value instanceof Error || lowerKey === "error" || lowerKey.endsWith("error")) {
      normalized[key] = isSerializedError(value) ? value : serializeError(value);
      continue;
    }
    normalized[key] = value;
  }
  return normalized;
};

/**
 * Walks an error's `cause` chain looking for a system error code such as
 * `ECONNREFUSED`. Node's fetch reports connection failures as
 * `TypeError: fetch failed` with the code on the cause.
 */
export const findErrorCode = (error: unknown, depth: number = 0): string | undefined => {
  if (!isRecord(error) && !(error instanceof Error)) return undefined;
  if (depth > 4) return undefined;

  const code: unknown = Reflect.get(error, "code");
  if (typeof code === "string" && code.length > 0) {
    return code;
  }

  return findErrorCode(Reflect.get(error, "cause"), depth + 1);
};

export const stripQuery = (url: string): string => {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
};
