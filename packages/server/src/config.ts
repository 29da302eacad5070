import path from 'path';
import os from 'os';
import { fileURLToPath } from 'url';
import type { DetectorName } from '@bmad-dashboard/shared';

export interface DashboardConfig {
  port: number;
  host: string;
  /** Where recent-projects.json lives */
  dataDir: string;
  /** Project to open on startup instead of the most recent one */
  startupProject?: string;
  /** Bearer token required on every route when set */
  authToken?: string;
  /** Built client served at / when the directory exists */
  staticDir: string;
  pollIntervalMs: number;
  debounceMs: number;
  heartbeatIntervalMs: number;
  probeTimeoutMs: number;
  dispatchTimeoutMs: number;
  /** How long a dashboard launch reports "starting" before detection catches up */
  launchGraceMs: number;
  probeOrder: DetectorName[];
  /** Accept a bare project-name match (not just the full path) as project evidence */
  probeNameMatch: boolean;
  maxRecentProjects: number;
}

export const DEFAULT_PORT = 8765;
export const DEFAULT_PROBE_ORDER: DetectorName[] = ['process', 'parent-shell', 'window-title'];
const DETECTOR_NAMES = new Set<string>(DEFAULT_PROBE_ORDER);

const DEFAULT_STATIC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../client/dist');

function parseArgValue(args: string[], key: string): string | undefined {
  const idx = args.indexOf(key);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
  return value;
}

function parseNumber(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function parseProbeOrder(raw: string | undefined): DetectorName[] {
  if (!raw) return [...DEFAULT_PROBE_ORDER];
  const order: DetectorName[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim();
    if (!isDetectorName(name)) {
      console.warn(`[config] Ignoring unknown detector "${name}" in probe order`);
      continue;
    }
    if (!order.includes(name)) order.push(name);
  }
  return order.length > 0 ? order : [...DEFAULT_PROBE_ORDER];
}

function isDetectorName(value: string): value is DetectorName {
  return DETECTOR_NAMES.has(value);
}

export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): DashboardConfig {
  const dataDirRaw = parseArgValue(argv, '--data-dir') || env.BMAD_DASHBOARD_DATA_DIR || '~/.bmad-dashboard';
  const startupProject = parseArgValue(argv, '--project') || env.BMAD_PROJECT;
  const staticDir = parseArgValue(argv, '--static-dir') || env.BMAD_STATIC_DIR;

  return {
    port: parseNumber(parseArgValue(argv, '--port') || env.PORT, DEFAULT_PORT),
    host: parseArgValue(argv, '--host') || env.HOST || '127.0.0.1',
    dataDir: path.resolve(expandHome(dataDirRaw)),
    startupProject: startupProject ? path.resolve(expandHome(startupProject)) : undefined,
    authToken: env.AUTH_TOKEN || undefined,
    staticDir: staticDir ? path.resolve(expandHome(staticDir)) : DEFAULT_STATIC_DIR,
    pollIntervalMs: parseNumber(parseArgValue(argv, '--poll-interval') || env.BMAD_POLL_INTERVAL_MS, 10_000),
    debounceMs: parseNumber(env.BMAD_DEBOUNCE_MS, 300),
    heartbeatIntervalMs: parseNumber(env.BMAD_HEARTBEAT_MS, 30_000),
    probeTimeoutMs: parseNumber(env.BMAD_PROBE_TIMEOUT_MS, 3000),
    dispatchTimeoutMs: parseNumber(env.BMAD_DISPATCH_TIMEOUT_MS, 5000),
    launchGraceMs: parseNumber(env.BMAD_LAUNCH_GRACE_MS, 20_000),
    probeOrder: parseProbeOrder(parseArgValue(argv, '--probe-order') || env.BMAD_PROBE_ORDER),
    probeNameMatch: env.BMAD_PROBE_NAME_MATCH !== 'false',
    maxRecentProjects: 10,
  };
}
