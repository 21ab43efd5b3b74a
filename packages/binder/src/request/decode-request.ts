import { Logger, withRequestId } from '@argbind/logger';
import type { TypeOf, ZodType, ZodTypeAny, ZodTypeDef } from 'zod';

import { ArgsParser } from '../args';
import { scanArgs } from '../scanner';
import { decodeCanonical, decodeStructured, unmarshalArgs } from '../tree';

import { BodyFormat } from './enums';
import type { BindRequestOptions, DecodableRequest, DecodeRequestOptions } from './interfaces';
import { parseXmlBody } from './xml-body';

const logger = new Logger('RequestDecoder');
const textDecoder = new TextDecoder();

/**
 * Picks the body decoder from a `content-type` header. Anything that is
 * neither JSON nor XML is read as urlencoded.
 */
export function resolveBodyFormat(contentType?: string | null): BodyFormat {
  const mediaType = (contentType ?? '').toLowerCase();

  if (mediaType.includes('json')) {
    return BodyFormat.Json;
  }

  if (mediaType.includes('xml')) {
    return BodyFormat.Xml;
  }

  return BodyFormat.FormUrlEncoded;
}

/**
 * Decodes a request body into the shape of `schema`. JSON and XML documents are
 * decoded directly, urlencoded bodies through their canonical tree.
 */
export function decodeRequest<S extends ZodTypeAny>(
  request: DecodableRequest,
  schema: S,
  options: DecodeRequestOptions = {},
): TypeOf<S> {
  return inRequestScope(options.requestId, (): TypeOf<S> => {
    const format = resolveBodyFormat(request.contentType);
    const body = readBody(request);

    logger.debug('decoding request body', { format, length: body.length });

    switch (format) {
      case BodyFormat.Json:
        return decodeCanonical(body, schema);
      case BodyFormat.Xml:
        return decodeStructured(parseXmlBody(body), schema);
      case BodyFormat.FormUrlEncoded:
        return unmarshalArgs(new ArgsParser(options.args).parse(body), schema, options.tree);
    }
  });
}

/**
 * Populates `target` from a request body of any supported format.
 *
 * Urlencoded bodies bind onto the `@Field` properties annotated under
 * `namespace`. JSON and XML documents are decoded through `schema` and the
 * result is assigned onto `target`.
 *
 * @returns the keys that were assigned
 */
export function bindRequest<T extends object>(
  request: DecodableRequest,
  target: T,
  namespace: string,
  schema: ZodType<Partial<T>, ZodTypeDef, unknown>,
  options: BindRequestOptions = {},
): string[] {
  return inRequestScope(options.requestId, (): string[] => {
    const format = resolveBodyFormat(request.contentType);
    const body = readBody(request);

    logger.debug('binding request body', { format, namespace, length: body.length });

    if (format === BodyFormat.FormUrlEncoded) {
      return scanArgs(new ArgsParser(options.args).parse(body), target, namespace);
    }

    const data =
      format === BodyFormat.Json ? decodeCanonical(body, schema) : decodeStructured(parseXmlBody(body), schema);

    Object.assign(target, data);

    return Object.keys(data);
  });
}

function inRequestScope<R>(requestId: string | undefined, callback: () => R): R {
  return requestId === undefined ? callback() : withRequestId(requestId, callback);
}

function readBody(request: DecodableRequest): string {
  return typeof request.body === 'string' ? request.body : textDecoder.decode(request.body);
}
