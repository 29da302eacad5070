import path from 'path';
import { isStoryStatus } from '@bmad-dashboard/shared';
import { isRecord } from './parsers/yamlFile';
import { MAX_INPUT_LENGTH } from './claude/inputDispatcher';

const MAX_PATH_LENGTH = 1024;
const STORY_ID = /^\d+-\d+$/;
const MODULE_NAME = /^[a-z][a-z0-9_-]{0,31}$/;
const CONFIG_KEY = /^[a-z][a-z0-9_]{0,63}$/;

/**
 * Validators return an error message string if invalid, or null if valid.
 */

export function validateProjectPath(value: unknown, field = 'path'): string | null {
  if (typeof value !== 'string' || !value.trim()) {
    return `${field} is required and must be a string`;
  }
  if (value.length > MAX_PATH_LENGTH) {
    return `${field} is too long (max ${MAX_PATH_LENGTH} chars)`;
  }
  if (!path.isAbsolute(value)) {
    return `${field} must be an absolute path`;
  }
  if (value.includes('\0')) {
    return `${field} contains a null byte`;
  }
  return null;
}

export function validateOpenProject(body: unknown): string | null {
  if (!isRecord(body)) return 'Request body must be a JSON object';
  return validateProjectPath(body.path);
}

export function validateCreateProject(body: unknown): string | null {
  if (!isRecord(body)) return 'Request body must be a JSON object';
  const pathError = validateProjectPath(body.path);
  if (pathError) return pathError;

  const config = body.config;
  if (!isRecord(config)) return 'config is required and must be an object';
  if (typeof config.user_name !== 'string' || !config.user_name.trim()) {
    return 'config.user_name is required';
  }
  for (const [key, value] of Object.entries(config)) {
    if (!CONFIG_KEY.test(key)) return `config key "${key}" is not allowed`;
    if (value !== null && typeof value === 'object') return `config.${key} must be a scalar`;
  }
  if (typeof config.output_folder === 'string' && config.output_folder.split(/[\\/]/).includes('..')) {
    return 'config.output_folder cannot leave the project directory';
  }

  if (body.modules !== undefined) {
    if (!Array.isArray(body.modules)) return 'modules must be an array of names';
    for (const name of body.modules) {
      if (typeof name !== 'string' || !MODULE_NAME.test(name)) return `Invalid module name: ${String(name)}`;
    }
  }
  return null;
}

export function validateStoryId(value: unknown): string | null {
  if (typeof value !== 'string' || !STORY_ID.test(value)) {
    return 'storyId must look like "6-1"';
  }
  return null;
}

export function validateStoryUpdate(body: unknown): string | null {
  if (!isRecord(body)) return 'Request body must be a JSON object';
  const idError = validateStoryId(body.storyId);
  if (idError) return idError;
  if (!isStoryStatus(body.status)) {
    return `status must be one of backlog, drafted, ready-for-dev, in-progress, review, done`;
  }
  return null;
}

export function validateInputText(value: unknown): string | null {
  if (typeof value !== 'string' || !value.trim()) {
    return 'text is required for the send action';
  }
  if (value.length > MAX_INPUT_LENGTH) {
    return `text is too long (max ${MAX_INPUT_LENGTH} chars)`;
  }
  return null;
}
