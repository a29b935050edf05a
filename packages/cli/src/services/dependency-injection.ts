import { Config, Executor, Sizer } from '@scansplit/core';
import type { Logger } from '@scansplit/core';

/**
 * Dependency Injection Service for the scansplit CLI
 *
 * Creates the core collaborators a command needs. Commands ask the service
 * instead of constructing them, so tests can swap in fakes.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private execCommand: Executor.ExecCommand | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Reads an optional config file. No path means an empty config.
   */
  async loadConfigFile(filePath?: string): Promise<Config.ScanSplitConfigFile> {
    if (!filePath) {
      return {};
    }
    return Config.loadConfigFile(filePath);
  }

  async readDetectProperties(filePath: string): Promise<string[]> {
    return Config.readDetectPropertiesFile(filePath);
  }

  getTreeSizer(config: Config.ScanSplitConfig): Sizer.TreeSizer {
    return new Sizer.FsTreeSizer({
      exclude: config.exclude,
      followSymlinks: config.followSymlinks,
    });
  }

  getScanExecutor(
    config: Config.ScanSplitConfig,
    credentials: Config.ServerCredentials,
    logger: Logger.Logger
  ): Executor.ScanExecutor {
    if (!this.execCommand) {
      this.execCommand = Executor.createExecCommand();
    }
    return new Executor.DetectScanExecutor(
      {
        credentials,
        detectJarPath: config.detectJarPath,
        detectProperties: config.detectProperties,
        loggingDir: config.loggingDir,
      },
      { execCommand: this.execCommand, logger }
    );
  }
}
