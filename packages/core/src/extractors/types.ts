import type { Logger } from "../logger.js";

export interface ExtractOptions {
  /** Field delimiter for csv input (tsv always uses a tab) */
  delimiter?: string;
  /** Column or property holding the citation key in structured input */
  citationKeyField?: string;
  logger?: Logger;
}

export type Extractor = (text: string, options: ExtractOptions) => string[];
