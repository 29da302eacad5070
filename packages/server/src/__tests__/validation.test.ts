import { describe, it, expect } from 'vitest';
import path from 'path';
import {
  validateCreateProject,
  validateInputText,
  validateOpenProject,
  validateProjectPath,
  validateStoryId,
  validateStoryUpdate,
} from '../validation';

const PROJECT = path.resolve('/tmp/project'); // absolute on the current OS

describe('validateProjectPath', () => {
  it('accepts an absolute path', () => {
    expect(validateProjectPath(PROJECT)).toBeNull();
  });

  it('rejects missing, relative and oversized paths', () => {
    expect(validateProjectPath(undefined)).toBe('path is required and must be a string');
    expect(validateProjectPath('   ')).toBe('path is required and must be a string');
    expect(validateProjectPath('relative/dir')).toBe('path must be an absolute path');
    expect(validateProjectPath('~/work')).toBe('path must be an absolute path');
    expect(validateProjectPath(PROJECT + '/x'.repeat(600))).toBe('path is too long (max 1024 chars)');
  });

  it('rejects null bytes', () => {
    expect(validateProjectPath(PROJECT + '\0')).toBe('path contains a null byte');
  });
});

describe('validateOpenProject', () => {
  it('requires an object body', () => {
    expect(validateOpenProject(null)).toBe('Request body must be a JSON object');
    expect(validateOpenProject([PROJECT])).toBe('Request body must be a JSON object');
    expect(validateOpenProject({ path: PROJECT })).toBeNull();
  });
});

describe('validateCreateProject', () => {
  const valid = { path: PROJECT, config: { user_name: 'Ada', output_folder: 'docs' }, modules: ['bmm'] };

  it('accepts a valid request', () => {
    expect(validateCreateProject(valid)).toBeNull();
    expect(validateCreateProject({ path: PROJECT, config: { user_name: 'Ada' } })).toBeNull();
  });

  it('requires a user name', () => {
    expect(validateCreateProject({ path: PROJECT, config: {} })).toBe('config.user_name is required');
    expect(validateCreateProject({ path: PROJECT })).toBe('config is required and must be an object');
  });

  it('rejects nested values and odd keys', () => {
    expect(validateCreateProject({ ...valid, config: { user_name: 'Ada', extra: { a: 1 } } })).toBe(
      'config.extra must be a scalar'
    );
    expect(validateCreateProject({ ...valid, config: { user_name: 'Ada', 'Bad-Key': 1 } })).toBe(
      'config key "Bad-Key" is not allowed'
    );
  });

  it('keeps the output folder inside the project', () => {
    expect(validateCreateProject({ ...valid, config: { user_name: 'Ada', output_folder: '../elsewhere' } })).toBe(
      'config.output_folder cannot leave the project directory'
    );
  });

  it('validates module names', () => {
    expect(validateCreateProject({ ...valid, modules: 'bmm' })).toBe('modules must be an array of names');
    expect(validateCreateProject({ ...valid, modules: ['bmm', '../x'] })).toBe('Invalid module name: ../x');
  });
});

describe('story validation', () => {
  it('accepts epic-story ids only', () => {
    expect(validateStoryId('6-1')).toBeNull();
    expect(validateStoryId('6-1-login')).toBe('storyId must look like "6-1"');
    expect(validateStoryId(61)).toBe('storyId must look like "6-1"');
  });

  it('requires a known status', () => {
    expect(validateStoryUpdate({ storyId: '1-1', status: 'done' })).toBeNull();
    expect(validateStoryUpdate({ storyId: '1-1', status: 'finished' })).toBe(
      'status must be one of backlog, drafted, ready-for-dev, in-progress, review, done'
    );
  });
});

describe('validateInputText', () => {
  it('requires non-blank text within the limit', () => {
    expect(validateInputText('run the tests')).toBeNull();
    expect(validateInputText('  ')).toBe('text is required for the send action');
    expect(validateInputText('x'.repeat(100_001))).toBe('text is too long (max 100000 chars)');
  });
});
