export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  details?: Record<string, unknown>;
}

function readProperty(error: Error, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(error, key) ? Reflect.get(error, key) : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    const code = readProperty(error, 'code');
    if (typeof code === 'string' && code) {
      serialized.code = code;
    }

    const cause = readProperty(error, 'cause');
    if (cause) {
      serialized.cause = serializeError(cause);
    }

    const details = readProperty(error, 'details');
    if (isRecord(details)) {
      serialized.details = details;
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  if (isRecord(error)) {
    return {
      message: String(error.message || error.error || JSON.stringify(error)),
      name: typeof error.name === 'string' ? error.name : undefined,
      code: typeof error.code === 'string' ? error.code : undefined,
    };
  }

  return { message: String(error) };
}
