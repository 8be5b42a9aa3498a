import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({}, [])).toEqual({
      projectPath: resolve('projects'),
      activeProject: undefined,
      host: '0.0.0.0',
      port: 8765,
      heartbeatMs: 20_000,
      version: 'dev',
    });
  });

  it('reads overrides and treats empty values as unset', () => {
    const config = loadConfig(
      { PROJECT_DIR: '/srv/projects', ACTIVE_PROJECT: 'paper-waltz', PORT: '9000', WS_HEARTBEAT_MS: '0', HOST: '' },
      [],
    );
    expect(config).toMatchObject({
      projectPath: '/srv/projects', activeProject: 'paper-waltz', port: 9000, heartbeatMs: 0, host: '0.0.0.0',
    });
  });

  it('lets the first argument override the project path', () => {
    expect(loadConfig({ PROJECT_DIR: '/srv/projects' }, ['/tmp/one.json']).projectPath).toBe('/tmp/one.json');
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' }, [])).toThrow(ConfigError);
    expect(() => loadConfig({ WS_HEARTBEAT_MS: '-5' }, [])).toThrow(/WS_HEARTBEAT_MS/);
  });
});
