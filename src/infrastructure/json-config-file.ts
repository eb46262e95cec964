import type { FileSystemPort } from '../application/ports/file-system.port';
import { ConfigurationError } from '../application/errors';
import { parsePartialConsolidationConfig } from '../domain/consolidation-config';
import type { PartialConsolidationConfig } from '../domain/consolidation-config';

export class JsonConfigFile {
  public constructor(private readonly fileSystem: FileSystemPort) { }

  public async load(configPath: string): Promise<PartialConsolidationConfig> {
    const contents = await this.fileSystem.readTextFile(configPath);
    if (!contents.ok) {
      throw new ConfigurationError(`Cannot read config file ${configPath}`, [contents.error.message]);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents.value);
    } catch (error) {
      throw new ConfigurationError(`Config file ${configPath} is not valid JSON`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    return parsePartialConsolidationConfig(parsed, configPath);
  }
}
