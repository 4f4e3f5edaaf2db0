export type ProbeValue = string | number | boolean | null | ProbeObject;

export interface ProbeObject {
  [key: string]: ProbeValue;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Escape text for embedding between backticks. Backslash, backtick and `$`
 * are escaped; a carriage return is written as `\r` because template literals
 * normalize raw CR/CRLF to LF.
 */
export function escapeTemplateLiteral(text: string): string {
  return text.replace(/[\\`$\r]/g, (ch) => (ch === '\r' ? '\\r' : `\\${ch}`));
}

export function renderLiteral(value: ProbeValue): string {
  if (value === null) return 'null';
  switch (typeof value) {
    case 'string':
      return `\`${escapeTemplateLiteral(value)}\``;
    case 'number':
      if (!Number.isFinite(value)) throw new Error(`Cannot embed non-finite number ${value}`);
      return String(value);
    case 'boolean':
      return value ? 'true' : 'false';
    default:
      return renderObject(value);
  }
}

function renderObject(value: ProbeObject): string {
  const entries = Object.entries(value).map(([key, entry]) => {
    if (!IDENTIFIER.test(key)) throw new Error(`Invalid probe argument key: ${key}`);
    return `${key}: ${renderLiteral(entry)}`;
  });
  return `{ ${entries.join(', ')} }`;
}

/**
 * Render a call into the injected runtime. Every generated probe goes through
 * here, so every embedded value is escaped the same way.
 */
export function renderProbeCall(runtimeGlobal: string, method: string, request: ProbeObject): string {
  if (!IDENTIFIER.test(runtimeGlobal) || !IDENTIFIER.test(method)) {
    throw new Error(`Invalid probe target: ${runtimeGlobal}.${method}`);
  }
  return [
    '(() => {',
    `  const probes = window.${runtimeGlobal};`,
    `  if (!probes) throw new Error('Probe runtime is not installed');`,
    `  probes.${method}(${renderLiteral(request)});`,
    '  return true;',
    '})()',
  ].join('\n');
}
