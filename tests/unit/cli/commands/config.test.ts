// Keep the persisted store out of the user's config directory
jest.mock('../../../../src/cli/lib/ConfigManager.js', () => ({
  ConfigManager: {},
}));

import { parseConfigKey, parseConfigureValue } from '../../../../src/cli/commands/config.js';
import { ValidationError } from '../../../../src/configure/errors.js';

describe('config command', () => {
  describe('parseConfigKey', () => {
    it('should recognise root keys', () => {
      expect(parseConfigKey('url')).toEqual({ scope: 'root', name: 'url' });
      expect(parseConfigKey('username')).toEqual({ scope: 'root', name: 'username' });
    });

    it('should recognise configure defaults', () => {
      expect(parseConfigKey('configure.batchSize')).toEqual({ scope: 'configure', name: 'batchSize' });
    });

    it('should reject unknown keys', () => {
      expect(parseConfigKey('password')).toBeUndefined();
      expect(parseConfigKey('configure.unknown')).toBeUndefined();
      expect(parseConfigKey('configure.toString')).toBeUndefined();
    });
  });

  describe('parseConfigureValue', () => {
    it('should parse booleans and integers', () => {
      expect(parseConfigureValue('dryRun', 'true')).toBe(true);
      expect(parseConfigureValue('disableBatch', 'false')).toBe(false);
      expect(parseConfigureValue('batchSize', '25')).toBe(25);
      expect(parseConfigureValue('deployDelaySeconds', '0')).toBe(0);
    });

    it('should reject invalid values', () => {
      expect(() => parseConfigureValue('dryRun', 'yes')).toThrow('dryRun must be "true" or "false"');
      expect(() => parseConfigureValue('deployRetries', '0')).toThrow('deployRetries must be a positive integer');
      expect(() => parseConfigureValue('batchSize', '2.5')).toThrow('batchSize must be a positive integer');
    });

    it('should validate the deployment prefix', () => {
      expect(parseConfigureValue('deploymentPrefix', 'DEV_')).toBe('DEV_');
      expect(() => parseConfigureValue('deploymentPrefix', 'DEV-')).toThrow(ValidationError);
    });
  });
});
