import { ConfigService } from '@nestjs/config';
import {
  defaultDeployerOptions,
  loadCredentials,
  loadDeployerOptions,
  mergeDeployerOptions,
  parseBoolean,
  parseIpList,
} from './deployer-options';

describe('deployer options', () => {
  describe('mergeDeployerOptions', () => {
    const defaults = defaultDeployerOptions('/srv');

    it('keeps defaults for keys the update leaves out', () => {
      expect(mergeDeployerOptions(defaults, { branch: 'main' })).toEqual({
        useHttps: true,
        targetDirectory: '/srv',
        autoDeploy: true,
        branch: 'main',
        ipAllowList: null,
        logDestination: '/srv/deploy.log',
      });
    });

    it('ignores unrecognized keys', () => {
      const update = { branch: 'master', logFile: 'other.log', ipFilter: ['1.1.1.1'] };

      expect(mergeDeployerOptions(defaults, update)).toEqual(defaults);
    });

    it('does not modify its input', () => {
      mergeDeployerOptions(defaults, { autoDeploy: false });

      expect(defaults.autoDeploy).toBe(true);
    });
  });

  describe('parsing', () => {
    it.each([
      ['true', true],
      ['YES', true],
      ['1', true],
      ['off', false],
      [' false ', false],
    ])('reads %p as %p', (raw, expected) => {
      expect(parseBoolean('DEPLOY_AUTO', raw)).toBe(expected);
    });

    it('rejects anything else', () => {
      expect(() => parseBoolean('DEPLOY_AUTO', 'maybe')).toThrow('Invalid DEPLOY_AUTO value: maybe');
    });

    it('splits and trims an IP list', () => {
      expect(parseIpList(' 1.2.3.4, 5.6.7.8 ,')).toEqual(['1.2.3.4', '5.6.7.8']);
      expect(parseIpList('')).toBeNull();
    });
  });

  describe('loadDeployerOptions', () => {
    it('maps DEPLOY_* variables onto options', () => {
      const config = new ConfigService({
        DEPLOY_USE_HTTPS: 'false',
        DEPLOY_TARGET: 'site',
        DEPLOY_AUTO: 'no',
        DEPLOY_BRANCH: 'production',
        DEPLOY_IP_ALLOW_LIST: '10.0.0.1,10.0.0.2',
        DEPLOY_LOG_FILE: '/var/log/deploy.log',
      });

      expect(loadDeployerOptions(config, '/srv')).toEqual({
        useHttps: false,
        targetDirectory: '/srv/site',
        autoDeploy: false,
        branch: 'production',
        ipAllowList: ['10.0.0.1', '10.0.0.2'],
        logDestination: '/var/log/deploy.log',
      });
    });

    it('leaves unset variables out', () => {
      expect(loadDeployerOptions(new ConfigService({}), '/srv')).toEqual({});
    });

    it('turns the allow-list off for an empty value', () => {
      const config = new ConfigService({ DEPLOY_IP_ALLOW_LIST: '' });

      expect(loadDeployerOptions(config, '/srv')).toEqual({ ipAllowList: null });
    });

    it('fails on an invalid boolean', () => {
      const config = new ConfigService({ DEPLOY_USE_HTTPS: 'sometimes' });

      expect(() => loadDeployerOptions(config, '/srv')).toThrow(
        'Invalid DEPLOY_USE_HTTPS value: sometimes',
      );
    });
  });

  describe('loadCredentials', () => {
    it('is null without a username', () => {
      expect(loadCredentials(new ConfigService({ DEPLOY_PASSWORD: 'test-secret' }))).toBeNull();
    });

    it('reads a username with an optional password', () => {
      expect(loadCredentials(new ConfigService({ DEPLOY_USERNAME: 'deploy' }))).toEqual({
        username: 'deploy',
      });
      expect(
        loadCredentials(
          new ConfigService({ DEPLOY_USERNAME: 'deploy', DEPLOY_PASSWORD: 'test-secret' }),
        ),
      ).toEqual({ username: 'deploy', password: 'test-secret' });
    });
  });
});
