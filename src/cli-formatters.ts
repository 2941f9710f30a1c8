/**
 * Human-readable CLI formatters for project-switchboard commands.
 * Use --json flag for raw JSON output instead.
 */

export const BOX_WIDTH = 72;

export function padRight(str: string, len: number): string {
  return str.length >= len ? str : str + ' '.repeat(len - str.length);
}

export function wrapLine(text: string, maxWidth: number): string[] {
  if (text.length <= maxWidth) return [text];
  const words = text.split(' ');
  const out: string[] = [];
  let cur = '';
  for (const word of words) {
    const candidate = cur ? `${cur} ${word}` : word;
    if (candidate.length > maxWidth && cur) {
      out.push(cur);
      cur = word;
    } else cur = candidate;
  }
  if (cur) out.push(cur);
  return out;
}

export function drawBox(title: string, lines: string[], width: number = 60): string[] {
  const output: string[] = [];
  const inner = width - 4; // 2 for "| " + 2 for " |"
  const dashes = '─';
  const titlePart = `┌─ ${title} `;
  const remaining = Math.max(0, width - titlePart.length - 1);
  output.push(titlePart + dashes.repeat(remaining) + '┐');
  for (const line of lines) {
    for (const wl of wrapLine(line, inner)) {
      const padded = wl + ' '.repeat(Math.max(0, inner - wl.length));
      output.push(`│ ${padded} │`);
    }
  }
  output.push('└' + dashes.repeat(width - 2) + '┘');
  return output;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown, fallback = ''): string {
  return typeof value === 'string' || typeof value === 'number' ? String(value) : fallback;
}

export function formatProjects(data: Record<string, unknown>): void {
  const projects = Array.isArray(data.projects) ? data.projects.filter(isRecord) : [];
  if (projects.length === 0) {
    console.log('No projects registered.');
    return;
  }
  for (const project of projects) {
    const marker = project.active === true ? '*' : ' ';
    console.log(
      `${marker} ${padRight(text(project.name), 24)} ${padRight(text(project.trainingStatus), 10)} ${text(project.id)}`
    );
  }
  console.log('');
  console.log(`${projects.length} project${projects.length === 1 ? '' : 's'} total.`);
}

function managerLines(managers: unknown): string[] {
  if (!isRecord(managers)) return [];
  return Object.entries(managers).map(([name, value]) => {
    const status = isRecord(value) ? text(value.status) : text(value);
    const error = isRecord(value) && typeof value.error === 'string' ? ` (${value.error})` : '';
    return `  ${padRight(name, 16)} ${status}${error}`;
  });
}

export function formatStatus(data: Record<string, unknown>): void {
  const project = isRecord(data.project) ? data.project : null;
  const lines: string[] = [];
  if (!project) {
    lines.push('No active project.');
    if (typeof data.hint === 'string') lines.push(data.hint);
  } else {
    lines.push(`Project: ${text(project.name)} (${text(project.id)})`);
    lines.push(`Source:  ${text(project.sourcePath)}`);
    lines.push(`Training: ${text(project.trainingStatus)}`);
    lines.push('');
    lines.push(...managerLines(data.managers));
  }
  for (const line of drawBox('Active Project', lines, BOX_WIDTH)) console.log(line);
}

export function formatHealth(data: Record<string, unknown>): void {
  const lines: string[] = [];
  lines.push(`Status:  ${text(data.status, 'unknown')}`);
  lines.push(`Project: ${text(data.currentProjectId, '(none)')}`);
  if (isRecord(data.registry)) {
    const reachable = data.registry.reachable === true;
    lines.push(
      reachable
        ? `Registry: ${text(data.registry.projectCount, '0')} projects`
        : `Registry: unreachable (${text(data.registry.error)})`
    );
  }
  lines.push('');
  lines.push(...managerLines(data.managers));
  if (isRecord(data.cache) && isRecord(data.cache.hits)) {
    lines.push('');
    lines.push(
      `Cache: ${text(data.cache.memoryEntries, '0')} in memory, ${text(data.cache.diskEntries, '0')} on disk, ` +
        `${text(data.cache.hits.memory, '0')}/${text(data.cache.hits.disk, '0')} hits, ${text(data.cache.misses, '0')} misses`
    );
  }
  for (const line of drawBox('Health', lines, BOX_WIDTH)) console.log(line);
}

export function formatSearch(data: Record<string, unknown>): void {
  const results = Array.isArray(data.results) ? data.results.filter(isRecord) : [];
  if (results.length === 0) {
    console.log(`No results for "${text(data.query)}".`);
    return;
  }
  results.forEach((result, index) => {
    console.log(`${index + 1}. ${text(result.file)}  [${text(result.language)}]  score ${text(result.score)}`);
    const snippet = text(result.snippet).split('\n').slice(0, 6);
    for (const line of snippet) console.log(`    ${line}`);
    console.log('');
  });
}

export function formatJson(json: string, useJson: boolean, command?: string): void {
  if (useJson) {
    console.log(json);
    return;
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    console.log(json);
    return;
  }
  if (!isRecord(data)) {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  switch (command) {
    case 'projects':
      formatProjects(data);
      break;
    case 'status':
      formatStatus(data);
      break;
    case 'health':
      formatHealth(data);
      break;
    case 'search':
      formatSearch(data);
      break;
    default:
      console.log(JSON.stringify(data, null, 2));
  }
}
