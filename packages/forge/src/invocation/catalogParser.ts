import type { CatalogFunction } from '../types';

const SECTION_HEADING = /^##\s+(.+?)\s*#*\s*$/;
const PARAMETERS_LINE = /^\s*(?:[-*]\s*)?\**parameters\**\s*:\**\s*(.*)$/i;
const PURPOSE_LINE = /^\s*(?:[-*]\s*)?\**(?:purpose|description)\**\s*:\**\s*(.+)$/i;
const BULLET = /^\s*[-*+]\s+(.*)$/;
const IDENTIFIER = /[A-Za-z_$][\w$]*/;
const CALL_SHAPE = /([A-Za-z_$][\w$]*)\s*\(([^)]*)\)/;

const cleanInline = (text: string) => text.replace(/[`*]/g, '').trim();

const firstIdentifier = (text: string): string | null => cleanInline(text).match(IDENTIFIER)?.[0] ?? null;

function splitParameterList(text: string): string[] {
  const cleaned = cleanInline(text);
  if (!cleaned || /^(none|n\/a|-)\.?$/i.test(cleaned)) return [];
  return cleaned
    .split(',')
    .map((part) => firstIdentifier(part))
    .filter((name): name is string => name !== null);
}

function parseSection(title: string, body: string[]): CatalogFunction | null {
  const cleanedTitle = cleanInline(title).replace(/^\d+[.)]\s*/, '');
  const callShape = cleanedTitle.match(CALL_SHAPE);
  const name = callShape ? callShape[1] : firstIdentifier(cleanedTitle);
  if (!name) return null;

  let parameters: string[] | null = null;
  let description = '';
  let collectingBullets = false;

  for (const line of body) {
    if (collectingBullets) {
      const bullet = line.match(BULLET);
      if (bullet) {
        const param = firstIdentifier(bullet[1]);
        if (param && parameters) parameters.push(param);
        continue;
      }
      if (line.trim() === '') continue;
      collectingBullets = false;
    }

    const paramsLine = line.match(PARAMETERS_LINE);
    if (paramsLine && parameters === null) {
      if (paramsLine[1].trim()) {
        parameters = splitParameterList(paramsLine[1]);
      } else {
        parameters = [];
        collectingBullets = true;
      }
      continue;
    }

    const purpose = line.match(PURPOSE_LINE);
    if (purpose && !description) {
      description = cleanInline(purpose[1]);
      continue;
    }

    if (!description && line.trim() && !BULLET.test(line) && !/^\s*\**\w+\**\s*:/.test(line)) {
      description = cleanInline(line);
    }
  }

  return {
    name,
    description,
    parameters: parameters ?? (callShape ? splitParameterList(callShape[2]) : []),
  };
}

/**
 * Reads the `## name` sections of a function catalog. Parameters come from a `Parameters:` line,
 * the bullet list under it, or the call shape in the heading.
 */
export function parseCatalog(markdown: string): CatalogFunction[] {
  const functions: CatalogFunction[] = [];
  let title: string | null = null;
  let body: string[] = [];

  const flush = () => {
    if (title === null) return;
    const parsed = parseSection(title, body);
    if (parsed && !functions.some((fn) => fn.name === parsed.name)) functions.push(parsed);
  };

  for (const line of markdown.split(/\r?\n/)) {
    const heading = line.match(SECTION_HEADING);
    if (heading) {
      flush();
      title = heading[1];
      body = [];
    } else if (title !== null) {
      body.push(line);
    }
  }
  flush();

  return functions;
}

export function formatCatalog(catalog: CatalogFunction[]): string {
  return catalog
    .map((fn) => {
      const params = fn.parameters.length > 0 ? fn.parameters.join(', ') : 'none';
      return `- ${fn.name}(${params})${fn.description ? `: ${fn.description}` : ''}`;
    })
    .join('\n');
}
