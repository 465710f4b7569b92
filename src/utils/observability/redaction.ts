const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential|encryption[_-]?key|auth[_-]?tag)/i;
const ACCOUNT_KEY_PATTERN = /^(accountNumber|account_number)$/i;
const CONTENT_KEY_PATTERN = /^(body|content|emailBody|rawEmail|sampleEmails|systemPrompt|prompt)$/i;

const EMAIL_PATTERN = /([A-Za-z0-9._%+-]+)@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g;

type RedactOptions = {
  depth?: number;
};

function maskEmailMatch(_match: string, local: string, domain: string): string {
  return `${local.slice(0, 3)}***@${domain}`;
}

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  if (key && ACCOUNT_KEY_PATTERN.test(key)) {
    return redactAccountNumber(value);
  }
  return value.replace(EMAIL_PATTERN, maskEmailMatch);
}

function redactUnknown(
  value: unknown,
  key?: string,
  options: RedactOptions = {},
): unknown {
  const depth = options.depth ?? 0;
  if (depth > 6) return '[TRUNCATED]';

  if (value === null || value === undefined) return value;

  if (value instanceof Date) {
    return value.toISOString();
  }

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

/** `alice@example.com` -> `ali***@example.com` */
export function redactEmail(address: string): string {
  return address.replace(EMAIL_PATTERN, maskEmailMatch);
}

export function redactAccountNumber(value: string): string {
  const visible = value.replace(/[^0-9A-Za-z]/g, '');
  if (visible.length < 4) return '***';
  return `***${visible.slice(-4)}`;
}

export function redactSecrets(value: Record<string, unknown>): Record<string, unknown>;
export function redactSecrets(value: string): string;
export function redactSecrets(value: Record<string, unknown> | string): Record<string, unknown> | string {
  if (typeof value === 'string') {
    return redactStringByKey(undefined, value);
  }
  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    result[key] = SECRET_KEY_PATTERN.test(key) ? '[REDACTED]' : redactUnknown(child, key, { depth: 1 });
  }
  return result;
}

export function safeSnippet(value: string, maxLength = 140): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}...(truncated)`;
}
