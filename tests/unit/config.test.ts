/**
 * Rainflow Engine - Configuration Tests
 * =====================================
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, DEFAULT_FULL_CONFIG, initConfig, getConfig } from '../../src/core/config';

describe('ConfigManager', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rainflow-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const filePath = path.join(tmpDir, 'config.json');
    fs.writeFileSync(filePath, JSON.stringify(content), 'utf-8');
    return filePath;
  }

  it('should start from the defaults', () => {
    const config = new ConfigManager();

    expect(config.getFullConfig()).toEqual(DEFAULT_FULL_CONFIG);
    expect(config.getConfigPath()).toBeNull();
    expect(config.validate()).toEqual({ valid: true, errors: [] });
  });

  it('should merge a partial file over the defaults', () => {
    const filePath = writeConfig({
      counting: { classCount: 10, flags: { matrix: false } },
      server: { port: 8080 },
    });
    const config = new ConfigManager(filePath);

    const counting = config.getCountingConfig();
    expect(counting.classCount).toBe(10);
    expect(counting.classWidth).toBe(1);
    expect(counting.flags.matrix).toBe(false);
    expect(counting.flags.damage).toBe(true);
    expect(config.getServerConfig().port).toBe(8080);
    expect(config.getConfigPath()).toBe(path.resolve(filePath));
  });

  it('should reject invalid values in a file', () => {
    const filePath = writeConfig({ counting: { countingMethod: 'bogus' } });

    expect(() => new ConfigManager(filePath)).toThrow('Invalid config file');
  });

  it('should reject unknown keys in a file', () => {
    const filePath = writeConfig({ counting: { classes: 10 } });

    expect(() => new ConfigManager(filePath)).toThrow('Invalid config file');
  });

  it('should build session options with overrides', () => {
    const config = new ConfigManager();
    const options = config.getRainflowOptions({ hysteresis: 2, flags: { rangePair: false } });

    expect(options.classCount).toBe(100);
    expect(options.hysteresis).toBe(2);
    expect(options.flags?.rangePair).toBe(false);
    expect(options.flags?.matrix).toBe(true);
    expect(options.woehler?.sx).toBe(1000);
    expect(options.woehler?.k2).toBe(-5);
  });

  it('should use a Woehler override as given', () => {
    const config = new ConfigManager();
    const options = config.getRainflowOptions({}, { sx: 10, nx: 100, k: -3, sd: 5 });

    expect(options.woehler?.sx).toBe(10);
    expect(options.woehler?.sd).toBe(5);
  });

  it('should report Clormann-Seeger with a method other than 4ptm', () => {
    const config = new ConfigManager();
    config.updateConfig({ counting: { residualMethod: 'clormann_seeger', countingMethod: 'hcm' } });

    expect(config.validate()).toEqual({
      valid: false,
      errors: ['counting.residualMethod clormann_seeger requires countingMethod 4ptm'],
    });
  });

  it('should report a zero class width', () => {
    const config = new ConfigManager();
    config.updateConfig({ counting: { classWidth: 0 } });

    expect(config.validate().errors).toContain('counting.classWidth must be positive when classes are counted');
  });

  it('should reject an invalid update and keep the current config', () => {
    const config = new ConfigManager();
    config.updateConfig({ server: { port: 8080 } });

    expect(() => config.updateConfig({ server: { port: -1 } })).toThrow('Invalid config update');
    expect(() => config.updateConfig({ counting: { classCount: 5000 } })).toThrow('Invalid config update');
    expect(config.getServerConfig().port).toBe(8080);
    expect(config.getCountingConfig().classCount).toBe(DEFAULT_FULL_CONFIG.counting.classCount);
    expect(config.validate().valid).toBe(true);
  });

  it('should save and reload its content', () => {
    const config = new ConfigManager();
    config.updateConfig({ woehler: { sd: 50 }, logging: { level: 'debug' } });

    const filePath = path.join(tmpDir, 'nested', 'saved.json');
    config.saveToFile(filePath);

    expect(new ConfigManager(filePath).getFullConfig()).toEqual(config.getFullConfig());
  });

  it('should refuse to save without a path', () => {
    expect(() => new ConfigManager().saveToFile()).toThrow('No config file path specified');
  });

  it('should hand out copies', () => {
    const config = new ConfigManager();
    config.getCountingConfig().flags.matrix = false;

    expect(config.getCountingConfig().flags.matrix).toBe(true);
  });

  it('should keep one global instance', () => {
    const config = initConfig();
    expect(getConfig()).toBe(config);
  });
});
