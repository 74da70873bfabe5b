/**
 * Escaping for labels and node ids placed in Mermaid flowcharts
 */

/**
 * Escapes a string for safe use as a Mermaid label
 * @param input The string to escape
 */
export function escapeMermaidString(input: string | null | undefined): string {
  if (input === null || input === undefined || input === '') return '';

  let escaped = String(input);

  escaped = escaped.replace(/\r/g, '').replace(/\n/g, ' ');

  escaped = escaped
    .replace(/"/g, '#quot;')
    .replace(/:/g, '#58;')
    .replace(/</g, '#60;')
    .replace(/>/g, '#62;')
    .replace(/\|/g, '#124;');

  return escaped;
}

/**
 * Turns a service name into a Mermaid node id
 */
export function toMermaidNodeId(name: string): string {
  return name.replace(/[^a-zA-Z0-9]/g, '_').toLowerCase();
}
