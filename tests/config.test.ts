import * as fs from 'fs';
import * as path from 'path';
import { loadConfig, loadConfigForFile, validateConfig } from '../src/runtime/config';

// Use a temp directory for test config files
const TEST_DIR = path.join(__dirname, '__config_test_tmp__');

beforeAll(() => {
  if (!fs.existsSync(TEST_DIR)) {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  }
});

afterAll(() => {
  if (fs.existsSync(TEST_DIR)) {
    fs.rmSync(TEST_DIR, { recursive: true });
  }
});

function writeConfig(name: string, content: unknown): string {
  const configPath = path.join(TEST_DIR, name);
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, typeof content === 'string' ? content : JSON.stringify(content));
  return configPath;
}

describe('Config Loader', () => {
  describe('loadConfig()', () => {
    it('should throw when explicit path does not exist', () => {
      expect(() => loadConfig('/nonexistent/path/tessera.config.json')).toThrow();
    });

    it('should not crash when no config file is found in cwd', () => {
      expect(loadConfig()).toBeDefined();
    });

    it('should load a valid config file', () => {
      const configPath = writeConfig('valid.config.json', { schema: 'json', trace: true, maxAliasExpansion: 50 });
      expect(loadConfig(configPath)).toEqual({ schema: 'json', trace: true, maxAliasExpansion: 50 });
    });

    it('should ignore unknown fields', () => {
      const configPath = writeConfig('extra.config.json', { editor: 'vim' });
      expect(loadConfig(configPath)).toEqual({});
    });

    it('should throw on invalid JSON', () => {
      const configPath = writeConfig('invalid.json', '{ not valid json }}}');
      expect(() => loadConfig(configPath)).toThrow(/Invalid JSON/);
    });

    it('should throw when the file is not an object', () => {
      const configPath = writeConfig('array.json', [1, 2]);
      expect(() => loadConfig(configPath)).toThrow(`Invalid config in ${configPath}: must be a JSON object`);
    });
  });

  describe('validateConfig()', () => {
    it('should reject an unknown schema', () => {
      expect(() => validateConfig({ schema: 'yaml' }, 'x.json')).toThrow(
        'Invalid "schema" in x.json: must be one of failsafe, json, core, yaml-1.1',
      );
    });

    it('should reject a non-boolean trace flag', () => {
      expect(() => validateConfig({ trace: 'yes' }, 'x.json')).toThrow('Invalid "trace" in x.json: must be a boolean');
    });

    it('should reject a negative or fractional alias limit', () => {
      expect(() => validateConfig({ maxAliasExpansion: -1 }, 'x.json')).toThrow(/Invalid "maxAliasExpansion"/);
      expect(() => validateConfig({ maxAliasExpansion: 1.5 }, 'x.json')).toThrow(/Invalid "maxAliasExpansion"/);
    });

    it('should accept a zero alias limit', () => {
      expect(validateConfig({ maxAliasExpansion: 0 }, 'x.json')).toEqual({ maxAliasExpansion: 0 });
    });
  });

  describe('loadConfigForFile()', () => {
    it('should find tessera.config.json beside the input file', () => {
      writeConfig('project/tessera.config.json', { schema: 'failsafe' });
      expect(loadConfigForFile(path.join(TEST_DIR, 'project', 'input.yaml'))).toEqual({ schema: 'failsafe' });
    });

    it('should fall back to .tesserarc.json', () => {
      writeConfig('rc/.tesserarc.json', { trace: false });
      expect(loadConfigForFile(path.join(TEST_DIR, 'rc', 'input.yaml'))).toEqual({ trace: false });
    });
  });
});
