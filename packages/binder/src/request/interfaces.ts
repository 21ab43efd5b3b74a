import type { ArgsParserOptions } from '../args';
import type { TreeBuilderOptions } from '../tree';

/**
 * The parts of an HTTP request the decoders read.
 */
export interface DecodableRequest {
  /** Value of the `content-type` header. */
  contentType?: string | null;
  body: string | Uint8Array;
}

export interface DecodeRequestOptions {
  args?: ArgsParserOptions;
  tree?: TreeBuilderOptions;
  /** Tags every record logged while decoding. */
  requestId?: string;
}

export type BindRequestOptions = Omit<DecodeRequestOptions, 'tree'>;
