const ENV_LINE_PATTERN = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\n/g, "\n").replace(/\\"/g, '"');
  }

  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }

  return value;
}

/**
 * Reads `KEY=value` lines. Blank lines, `#` comments and lines that are not assignments are skipped.
 */
export function parseEnvText(text: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const rawLine of text.replace(/\r\n/g, "\n").split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }

    const match = line.match(ENV_LINE_PATTERN);
    if (!match) {
      continue;
    }

    const [, key, value = ""] = match;
    if (key) {
      result[key] = unquote(value.trim());
    }
  }

  return result;
}

/** Later layers override earlier ones. */
export function mergeEnvironment(...layers: Array<Record<string, string>>): Record<string, string> {
  return layers.reduce<Record<string, string>>((merged, layer) => ({ ...merged, ...layer }), {});
}
