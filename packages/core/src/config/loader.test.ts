import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { remove } from 'fs-extra';
import { ConfigError } from '@cartwright/shared';
import { ConfigLoader, CONFIG_FILENAME } from './loader';

describe('ConfigLoader', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'cartwright-config-'));
  });

  afterEach(async () => {
    await remove(cwd);
  });

  async function writeRepoConfig(content: unknown): Promise<void> {
    await fs.writeFile(path.join(cwd, CONFIG_FILENAME), yaml.dump(content));
  }

  describe('load', () => {
    it('should load default config when no files exist', () => {
      const config = ConfigLoader.load({ cwd });
      expect(config.derivedDataPath).toBe('build/DerivedData');
      expect(config.platform).toBeUndefined();
      expect(config.carthage.cache).toBe(false);
    });

    it('should load repo config', async () => {
      await writeRepoConfig({ platform: 'iOS', carthage: { cache: true } });

      const config = ConfigLoader.load({ cwd });

      expect(config.platform).toBe('iOS');
      expect(config.carthage).toEqual({
        cache: true,
        archive: false,
        serializeDebugging: false,
        executable: 'carthage',
      });
    });

    it('should respect precedence: flags > explicit > repo', async () => {
      await writeRepoConfig({ platform: 'iOS', xcode: { version: '11.7' } });
      const explicitPath = path.join(cwd, 'ci.yaml');
      await fs.writeFile(explicitPath, yaml.dump({ platform: 'tvOS', carthage: { archive: true } }));

      const config = ConfigLoader.load({
        cwd,
        configPath: explicitPath,
        flags: { platform: 'watchOS', carthage: { cache: true } },
      });

      expect(config.platform).toBe('watchOS');
      expect(config.carthage.archive).toBe(true);
      expect(config.carthage.cache).toBe(true);
      expect(config.xcode.version).toBe('11.7');
    });

    it('should resolve a relative explicit config path against cwd', async () => {
      await fs.writeFile(path.join(cwd, 'alt.yaml'), yaml.dump({ derivedDataPath: 'dd' }));

      expect(ConfigLoader.load({ cwd, configPath: 'alt.yaml' }).derivedDataPath).toBe('dd');
    });

    it('should fail if explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ cwd, configPath: 'missing.yaml' })).toThrow(
        /Config file not found/,
      );
    });

    it('should list validation issues', async () => {
      await writeRepoConfig({ platform: 'visionOS' });

      expect(() => ConfigLoader.load({ cwd })).toThrow(ConfigError);
      expect(() => ConfigLoader.load({ cwd })).toThrow(/Configuration validation failed:\n- platform: /);
    });

    it('should treat an empty file as no config', async () => {
      await fs.writeFile(path.join(cwd, CONFIG_FILENAME), '');

      expect(ConfigLoader.load({ cwd }).configVersion).toBe(1);
    });
  });

  describe('loadYaml', () => {
    it('should throw ConfigError on invalid YAML', async () => {
      const file = path.join(cwd, 'bad.yaml');
      await fs.writeFile(file, 'platform: [iOS\n');

      expect(() => ConfigLoader.loadYaml(file)).toThrow(/Error parsing YAML file/);
    });

    it('should reject a top-level list', async () => {
      const file = path.join(cwd, 'list.yaml');
      await fs.writeFile(file, '- iOS\n');

      expect(() => ConfigLoader.loadYaml(file)).toThrow(/must contain a mapping/);
    });
  });

  describe('mergeConfigs', () => {
    it('should merge nested objects and replace arrays', () => {
      const merged = ConfigLoader.mergeConfigs(
        { carthage: { cache: false, archive: true }, tags: ['a'] },
        { carthage: { cache: true }, tags: ['b'], skip: undefined },
      );
      expect(merged).toEqual({ carthage: { cache: true, archive: true }, tags: ['b'] });
    });
  });
});
