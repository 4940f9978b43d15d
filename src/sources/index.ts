/**
 * Collaborator Adapters
 *
 * Default implementations of the pipeline's text source and token tagger.
 *
 * @module sources
 */

export {
  FileTextSource,
  parsePdfText,
  isSupportedDocument,
  TEXT_EXTENSIONS,
  PDF_EXTENSION,
  type PdfTextParser,
} from './text-source.js';

export {
  WinkTokenTagger,
  importModel,
  toToken,
  type ModelLoader,
  type WinkTokenFields,
} from './wink-tagger.js';
