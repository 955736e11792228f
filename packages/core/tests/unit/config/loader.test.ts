import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_SCORING_WEIGHTS,
  loadConfigFile,
  parseConfig,
  substituteEnvVars,
} from '../../../src/config';
import { ConfigLoadError, ConfigValidationError } from '../../../src/errors';

describe('config', () => {
  describe('parseConfig', () => {
    it('should apply defaults to an empty config', () => {
      const config = parseConfig({}, { env: {} });
      expect(config).toMatchObject({
        targetIdentity: 'all',
        maxTrustHops: 3,
        actionsOfInterest: 'all',
        concurrency: 4,
        identityTimeoutMs: 5000,
        trustHopDecay: 0.5,
        context: {},
      });
      expect(config.topN).toBeUndefined();
      expect(config.scoring.weights).toEqual(DEFAULT_SCORING_WEIGHTS);
      expect(config.scoring.classificationTiers.restricted).toBe(3);
      expect(config.permissionStrength.rules).toHaveLength(10);
      expect(config.permissionStrength.defaultWeight).toBe(1);
    });

    it('should not share default tables between configs', () => {
      const first = parseConfig({}, { env: {} });
      first.scoring.classificationTiers.secret = 9;
      const second = parseConfig({}, { env: {} });
      expect(second.scoring.classificationTiers.secret).toBeUndefined();
    });

    it('should report every invalid field', () => {
      try {
        parseConfig({ concurrency: 0, trustHopDecay: 2 }, { env: {} });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        expect(error).toMatchObject({
          issues: [
            { path: 'concurrency', message: 'Number must be greater than 0' },
            { path: 'trustHopDecay', message: 'Number must be less than or equal to 1' },
          ],
        });
      }
    });

    it('should reject unknown keys', () => {
      expect(() => parseConfig({ bogus: true }, { env: {} })).toThrow(
        "Invalid configuration: (root): Unrecognized key(s) in object: 'bogus'",
      );
    });

    it('should validate permission rule patterns and scoring weights', () => {
      expect(() =>
        parseConfig({ permissionStrength: { rules: [{ pattern: 'a*b', weight: 1 }] } }, { env: {} }),
      ).toThrow('permissionStrength.rules.0.pattern: Wildcards are only supported as a prefix or suffix');
      expect(() =>
        parseConfig({ scoring: { weights: { classification: 0, sensitivity: 0, businessImpact: 0 } } }, { env: {} }),
      ).toThrow('scoring.weights: At least one scoring weight must be positive');
    });
  });

  describe('substituteEnvVars', () => {
    it('should substitute variables and defaults', () => {
      expect(
        substituteEnvVars(
          { region: 'eu-${REGION}', hops: '${HOPS:-2}', tags: ['${TAG:-pii}'], strict: '${STRICT}' },
          { REGION: 'west', STRICT: 'true' },
        ),
      ).toEqual({ region: 'eu-west', hops: 2, tags: ['pii'], strict: true });
    });

    it('should use the default for an empty variable', () => {
      expect(substituteEnvVars('${NAME:-fallback}', { NAME: '' })).toBe('fallback');
    });

    it('should require variables without a default', () => {
      expect(() => substituteEnvVars('${MISSING}', {})).toThrow(ConfigLoadError);
      expect(() => substituteEnvVars('${MISSING}', {})).toThrow("Required environment variable 'MISSING' not set");
    });

    it('should leave other values alone', () => {
      expect(substituteEnvVars({ n: 3, b: false, none: null }, {})).toEqual({ n: 3, b: false, none: null });
    });
  });

  describe('loadConfigFile', () => {
    let dir: string;

    beforeAll(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'blast-radius-config-'));
    });

    afterAll(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should load YAML with substitution', () => {
      const file = path.join(dir, 'engine.yaml');
      fs.writeFileSync(
        file,
        [
          'maxTrustHops: ${HOPS:-2}',
          'topN: 10',
          'actionsOfInterest: [read, write]',
          'context:',
          '  environment: ${ENVIRONMENT}',
          'scoring:',
          '  classificationOverrides:',
          '    db/customers: critical',
          '',
        ].join('\n'),
      );

      const config = loadConfigFile(file, { env: { ENVIRONMENT: 'prod' } });
      expect(config.maxTrustHops).toBe(2);
      expect(config.topN).toBe(10);
      expect(config.actionsOfInterest).toEqual(['read', 'write']);
      expect(config.context).toEqual({ environment: 'prod' });
      expect(config.scoring.classificationOverrides).toEqual({ 'db/customers': 'critical' });
    });

    it('should load JSON', () => {
      const file = path.join(dir, 'engine.json');
      fs.writeFileSync(file, JSON.stringify({ targetIdentity: 'alice', concurrency: 1 }));
      expect(loadConfigFile(file, { env: {} })).toMatchObject({ targetIdentity: 'alice', concurrency: 1 });
    });

    it('should treat an empty file as defaults', () => {
      const file = path.join(dir, 'empty.yaml');
      fs.writeFileSync(file, '');
      expect(loadConfigFile(file, { env: {} }).maxTrustHops).toBe(3);
    });

    it('should fail on missing files and bad YAML', () => {
      const missing = path.join(dir, 'missing.yaml');
      expect(() => loadConfigFile(missing)).toThrow(`Config file not found: ${missing}`);

      const broken = path.join(dir, 'broken.yaml');
      fs.writeFileSync(broken, 'topN: [unclosed');
      expect(() => loadConfigFile(broken, { env: {} })).toThrow(ConfigLoadError);
    });
  });
});
