const MAX_DESCRIPTION_CHARS = 80;

/**
 * Parse a leading `---` block of flat `key: value` lines.
 * Returns an empty object when the text has no frontmatter.
 */
export function parseFrontmatter(text: string): Record<string, string> {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  if (lines.length < 2 || lines[0].trim() !== "---") {
    return {};
  }

  const fields: Record<string, string> = {};
  for (const line of lines.slice(1)) {
    if (line.trim() === "---") {
      return fields;
    }
    const idx = line.indexOf(":");
    if (idx <= 0 || /^\s/.test(line)) continue;
    const key = line.slice(0, idx).trim();
    fields[key] = unquote(line.slice(idx + 1).trim());
  }

  // Unterminated block: not frontmatter.
  return {};
}

/**
 * Shorten an agent description for list output: cap at 80 chars, otherwise
 * keep the first sentence.
 */
export function summarizeDescription(description: string): string {
  if (description.length > MAX_DESCRIPTION_CHARS) {
    return description.slice(0, MAX_DESCRIPTION_CHARS) + "...";
  }
  if (description.includes(".")) {
    return description.split(".")[0] + ".";
  }
  return description;
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}
