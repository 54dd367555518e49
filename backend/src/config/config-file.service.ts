import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import { parse } from "yaml";

import { ConfigurationError, describeError } from "@wattplan/domain";

import type { ConfigDocument } from "./schemas";
import { configDocumentSchema } from "./schemas";

const DEFAULT_CONFIG_PATH = "config.yaml";

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  resolvePath(): string {
    const override = process.env.WATTPLAN_CONFIG?.trim();
    return resolve(process.cwd(), override && override.length > 0 ? override : DEFAULT_CONFIG_PATH);
  }

  async loadDocument(path: string): Promise<ConfigDocument> {
    this.logger.verbose(`Reading configuration from ${path}`);
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      throw new ConfigurationError(`Cannot read config file ${path}: ${describeError(error)}`, {path});
    }
    return this.parseDocument(raw, path);
  }

  parseDocument(raw: string, source = "<inline>"): ConfigDocument {
    let parsed: unknown;
    try {
      parsed = parse(raw);
    } catch (error) {
      throw new ConfigurationError(`Config file ${source} is not valid YAML: ${describeError(error)}`, {source});
    }
    const result = configDocumentSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new ConfigurationError(`Config file ${source} is invalid: ${issues}`, {source});
    }
    return result.data;
  }
}
