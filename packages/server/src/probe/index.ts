export { ProbeResolver, resolveSignals } from './resolver';
export type { ProbeInspection, ProbeResolverOptions } from './resolver';
export { ProbeContext, isAssistantProcess } from './context';
export { ProcessTableDetector, ParentShellDetector, WindowTitleDetector, createDetectors } from './detectors';
export { createSystemSource } from './systemSource';
export { containsPath, mentionsName, normalizeForMatch } from './pathMatch';
export type {
  DetectionResult,
  Detector,
  ProbeOutcome,
  ProcessInfo,
  ProcessSource,
  ProjectHint,
  WindowInfo,
} from './types';
