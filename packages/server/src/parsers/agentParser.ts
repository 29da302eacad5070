import type { Agent, AgentCommand } from '@bmad-dashboard/shared';
import { asString, isRecord, parseYamlText } from './yamlFile';

export const DEFAULT_AGENT_ICON = '🤖';
export const DEFAULT_COMMAND_ICON = '📋';

const AGENT_TAG = /<agent\b([^>]*)>/;
const ATTRIBUTE = /([\w-]+)="([^"]*)"/g;
const MENU_ITEM = /<item\s+cmd="([^"]+)"[^>]*>([^<]+)<\/item>/g;
const HIDDEN_COMMANDS = new Set(['*help', '*exit']);

function readAttributes(tagBody: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of tagBody.matchAll(ATTRIBUTE)) {
    attributes.set(match[1], match[2]);
  }
  return attributes;
}

function readFrontMatter(content: string): Record<string, unknown> {
  if (!content.startsWith('---')) return {};
  const end = content.indexOf('\n---', 3);
  if (end === -1) return {};
  const parsed = parseYamlText(content.slice(3, end), 'front matter');
  return parsed.state === 'ok' && isRecord(parsed.value) ? parsed.value : {};
}

function titleFromId(id: string): string {
  return id
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Parse an agent definition (`.bmad/bmm/agents/<id>.md`).
 *
 * Metadata comes from YAML front matter first, then from the `<agent>` tag;
 * commands come from `<item cmd="*name">label</item>` menu entries.
 */
export function parseAgentFile(id: string, content: string): Agent {
  const front = readFrontMatter(content);
  const tagMatch = AGENT_TAG.exec(content);
  const tag = tagMatch ? readAttributes(tagMatch[1]) : new Map<string, string>();

  const commands: AgentCommand[] = [];
  for (const match of content.matchAll(MENU_ITEM)) {
    const cmd = match[1].trim();
    if (HIDDEN_COMMANDS.has(cmd)) continue;
    commands.push({
      name: cmd.replace(/^\*+/, ''),
      icon: DEFAULT_COMMAND_ICON,
      label: match[2].trim(),
      description: '',
    });
  }

  return {
    id,
    name: tag.get('name') || asString(front.name) || id,
    title: asString(front.title) || tag.get('title') || titleFromId(id),
    icon: asString(front.icon) || tag.get('icon') || DEFAULT_AGENT_ICON,
    description: asString(front.description) || tag.get('description') || '',
    commands,
  };
}
