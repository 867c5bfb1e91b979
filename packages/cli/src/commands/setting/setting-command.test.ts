// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { ConfigManager, MemoryConfigStore } from '@themekit/core';
import { SettingCommand } from './setting-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('SettingCommand', () => {
  let settingCommand: SettingCommand;
  let store: MemoryConfigStore;

  beforeEach(() => {
    jest.clearAllMocks();

    store = new MemoryConfigStore();
    const mockDependencyService = {
      getConfigManager: jest.fn().mockReturnValue(new ConfigManager(store)),
      getConfigPath: jest.fn().mockReturnValue('/test/themekit/config.json')
    };

    jest.mocked(DependencyInjectionService.getInstance).mockReturnValue(mockDependencyService as never);

    settingCommand = new SettingCommand();
  });

  describe('get', () => {
    it('should print a default setting', async () => {
      await settingCommand.executeGet('cache_expiry', {});

      expect(mockConsoleLog).toHaveBeenCalledWith('300');
    });

    it('WHEN the key is unknown and a default is given THE SYSTEM SHALL print the default', async () => {
      await settingCommand.executeGet('theme_timeout', { default: '99' });

      expect(mockConsoleLog).toHaveBeenCalledWith('99');
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('WHEN the key is unknown and no default is given THE SYSTEM SHALL fail', async () => {
      await settingCommand.executeGet('theme_timeout', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Setting not found: theme_timeout');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('WHEN the default is not an integer THE SYSTEM SHALL fail', async () => {
      await settingCommand.executeGet('theme_timeout', { default: 'soon' });

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Failed to read setting: Setting value must be an integer, got "soon"'
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should output key and value as JSON', async () => {
      await settingCommand.executeGet('max_cache_size', { json: true });

      expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
        success: true,
        data: { key: 'max_cache_size', value: 50 }
      });
    });
  });

  describe('set', () => {
    it('WHEN an integer is given THE SYSTEM SHALL save it', async () => {
      await settingCommand.executeSet('cache_expiry', '600', {});

      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Setting updated: cache_expiry = 600');
      expect(JSON.parse(store.getRawContent() ?? '').settings).toEqual({ cache_expiry: 600, max_cache_size: 50 });
    });

    it('WHEN the value is not an integer THE SYSTEM SHALL fail without writing', async () => {
      await settingCommand.executeSet('cache_expiry', '1.5', {});

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Failed to set setting: Setting value must be an integer, got "1.5"'
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(store.getRawContent()).toBeNull();
    });

    it('WHEN the write fails THE SYSTEM SHALL name the config path', async () => {
      store.failWrites = true;

      await settingCommand.executeSet('cache_expiry', '600', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Failed to write configuration: /test/themekit/config.json');
    });
  });

  describe('list', () => {
    it('should print key = value lines', async () => {
      await settingCommand.executeList({});

      expect(mockConsoleLog).toHaveBeenCalledWith('cache_expiry = 300\nmax_cache_size = 50');
    });

    it('should say when no settings exist', async () => {
      store.setRawContent('{"settings": {}}');

      await settingCommand.executeList({});

      expect(mockConsoleLog).toHaveBeenCalledWith('No settings configured');
    });
  });
});
