import { parse as parseYaml } from 'yaml';

/**
 * Re-serializes a YAML document as JSON, two-space indented with a trailing newline.
 */
export function yamlToJson(source: string): string {
  const document: unknown = parseYaml(source);
  return JSON.stringify(document, null, 2) + '\n';
}

export function convertedPathFor(yamlPath: string): string {
  return yamlPath.replace(/\.ya?ml$/, '') + '.json';
}
