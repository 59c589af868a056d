import * as fs from "fs/promises";
import path from "path";
import { ConfigSchema } from "../types/config.js";
import type { Config } from "../types/config.js";

export class ConfigManager {
  private static CONFIG_FILE_NAME = "config.json";

  private static async exists(filePath: string): Promise<boolean> {
    return fs.access(filePath).then(
      () => true,
      () => false
    );
  }

  static homeDirectory(): string {
    return process.env.HOME || process.env.USERPROFILE || "";
  }

  /**
   * The working directory wins over `~/.larder`. Returns `null` when
   * neither holds a config file.
   */
  static async findConfigFile(
    cwd = process.cwd(),
    home = this.homeDirectory()
  ): Promise<string | null> {
    const candidates = [
      path.join(cwd, this.CONFIG_FILE_NAME),
      path.join(home, ".larder", this.CONFIG_FILE_NAME),
    ];
    for (const candidate of candidates) {
      if (await this.exists(candidate)) return candidate;
    }
    return null;
  }

  static async load(
    cwd = process.cwd(),
    home = this.homeDirectory()
  ): Promise<Config> {
    try {
      const configPath = await this.findConfigFile(cwd, home);
      const parsedConfig: unknown = configPath
        ? JSON.parse(await fs.readFile(configPath, "utf-8"))
        : {};

      // Validate the config against our schema
      const result = ConfigSchema.safeParse(parsedConfig);
      if (!result.success) {
        throw new Error(`Invalid configuration: ${result.error.message}`);
      }

      return result.data;
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load config: ${error.message}`);
      }
      throw error;
    }
  }

  static validate(config: unknown): config is Config {
    const result = ConfigSchema.safeParse(config);
    return result.success;
  }
}
