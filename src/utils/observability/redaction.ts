const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential|auth[_-]?tag|client[_-]?secret)/i;
const CONTENT_KEY_PATTERN = /^(text|body|content|lines|rosterText|rawText|ics|html)$/i;
const CREW_KEY_PATTERN = /^(crewName|crewId|employeeId|originalName|filename)$/i;

type RedactOptions = {
  depth?: number;
};

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  if (key && CREW_KEY_PATTERN.test(key)) {
    return redactIdentifier(value);
  }
  return value;
}

function redactUnknown(
  value: unknown,
  key?: string,
  options: RedactOptions = {},
): unknown {
  const depth = options.depth ?? 0;
  if (depth > 6) return '[TRUNCATED]';

  if (value === null || value === undefined) return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactStringByKey(key, value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (typeof value === 'string') {
    return redactStringByKey(key, value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return `[REDACTED_ARRAY len=${value.length}]`;
    }
    return value.map((item) => redactUnknown(item, key, { depth: depth + 1 }));
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      if (SECRET_KEY_PATTERN.test(childKey)) {
        result[childKey] = '[REDACTED]';
        continue;
      }
      result[childKey] = redactUnknown(childValue, childKey, { depth: depth + 1 });
    }
    return result;
  }

  return String(value);
}

/**
 * Keep the first and last character of a personal identifier.
 * "Jan Kowalski" -> "J***i"
 */
export function redactIdentifier(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 2) return '***';
  return `${trimmed[0]}***${trimmed[trimmed.length - 1]}`;
}

export function redactSecrets<T>(value: T): T {
  return redactUnknown(value) as T;
}

export function safeSnippet(value: string, maxLength = 140): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}...(truncated)`;
}
