// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { ConfigManager, MemoryConfigStore } from '@themekit/core';
import { RepoCommand } from './repo-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('RepoCommand', () => {
  let repoCommand: RepoCommand;
  let store: MemoryConfigStore;

  beforeEach(() => {
    jest.clearAllMocks();

    store = new MemoryConfigStore();
    const mockDependencyService = {
      getConfigManager: jest.fn().mockReturnValue(new ConfigManager(store)),
      getConfigPath: jest.fn().mockReturnValue('/test/themekit/config.json')
    };

    jest.mocked(DependencyInjectionService.getInstance).mockReturnValue(mockDependencyService as never);

    repoCommand = new RepoCommand();
  });

  describe('add', () => {
    it('WHEN a new URL is added THE SYSTEM SHALL save it and confirm', async () => {
      await repoCommand.executeAdd('https://example.com/repo', {});

      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Repository added: https://example.com/repo');
      expect(mockProcessExit).not.toHaveBeenCalled();
      expect(JSON.parse(store.getRawContent() ?? '')).toEqual({
        custom_repositories: ['https://example.com/repo'],
        settings: { cache_expiry: 300, max_cache_size: 50 }
      });
    });

    it('WHEN the URL already exists THE SYSTEM SHALL fail with exit code 1', async () => {
      await repoCommand.executeAdd('https://example.com/repo', {});
      await repoCommand.executeAdd('https://example.com/repo', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Repository already exists: https://example.com/repo');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(store.getSaveCount()).toBe(1);
    });

    it('WHEN the write fails THE SYSTEM SHALL name the config path', async () => {
      store.failWrites = true;

      await repoCommand.executeAdd('https://example.com/repo', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Failed to write configuration: /test/themekit/config.json');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('WHEN --json is provided THE SYSTEM SHALL output the JSON envelope', async () => {
      await repoCommand.executeAdd('https://example.com/repo', { json: true });

      const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(output).toEqual({
        success: true,
        data: { url: 'https://example.com/repo', status: 'added' }
      });
    });

    it('WHEN --quiet is provided THE SYSTEM SHALL print nothing', async () => {
      await repoCommand.executeAdd('https://example.com/repo', { quiet: true });

      expect(mockConsoleLog).not.toHaveBeenCalled();
    });
  });

  describe('remove', () => {
    it('WHEN a configured URL is removed THE SYSTEM SHALL confirm', async () => {
      store.setRawContent('{"custom_repositories": ["https://example.com/a", "https://example.com/b"]}');

      await repoCommand.executeRemove('https://example.com/a', {});

      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Repository removed: https://example.com/a');
      expect(JSON.parse(store.getRawContent() ?? '').custom_repositories).toEqual(['https://example.com/b']);
    });

    it('WHEN the URL is not configured THE SYSTEM SHALL fail without writing', async () => {
      await repoCommand.executeRemove('https://example.com/missing', { json: true });

      const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(output).toEqual({
        success: false,
        error: 'Repository not found: https://example.com/missing',
        exitCode: 1
      });
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(store.getRawContent()).toBeNull();
    });
  });

  describe('list', () => {
    it('should print one URL per line', async () => {
      store.setRawContent('{"custom_repositories": ["https://example.com/a", "https://example.com/b"]}');

      await repoCommand.executeList({});

      expect(mockConsoleLog).toHaveBeenCalledWith('https://example.com/a\nhttps://example.com/b');
    });

    it('should say when nothing is configured', async () => {
      await repoCommand.executeList({});

      expect(mockConsoleLog).toHaveBeenCalledWith('No custom repositories configured');
    });

    it('should output repositories as JSON', async () => {
      store.setRawContent('{"custom_repositories": ["https://example.com/a"]}');

      await repoCommand.executeList({ json: true });

      expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
        success: true,
        data: { repositories: ['https://example.com/a'] }
      });
    });
  });
});
