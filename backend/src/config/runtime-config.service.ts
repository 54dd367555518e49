import { Injectable } from "@nestjs/common";

import { ConfigurationError } from "@wattplan/domain";

import type { ConfigDocument } from "./schemas";

let bootstrapDocument: ConfigDocument | null = null;

/** Installs the document bootstrap loaded; must run before Nest instantiates providers. */
export function setRuntimeConfig(document: ConfigDocument): void {
  bootstrapDocument = document;
}

/** Live configuration document. Replaced as a whole on reconfiguration. */
@Injectable()
export class RuntimeConfigService {
  private document: ConfigDocument;

  constructor() {
    if (!bootstrapDocument) {
      throw new ConfigurationError("Runtime configuration not initialised");
    }
    this.document = bootstrapDocument;
  }

  getDocument(): ConfigDocument {
    return this.document;
  }

  replaceDocument(document: ConfigDocument): void {
    this.document = document;
  }
}
