import { Injectable, Logger } from '@nestjs/common';
import { Readable, Transform, TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import * as StreamJSON from 'stream-json';
import { streamValues } from 'stream-json/streamers/StreamValues';
import { StixObject } from '../../core/types/stix-types';
import {
  StixLoaderError,
  StixParseError,
  StixValidationError,
  errorMessage,
} from '../../core/exception/custom-exceptions';
import { VALIDATION_OPTIONS, bundleSchema, schemaFor } from './stix-schemas';

export interface InvalidObject {
  index: number;
  error: StixLoaderError;
}

export interface ParsedBundle {
  id: string;
  objects: StixObject[];
  invalid: InvalidObject[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class StixParserService {
  private readonly logger = new Logger(StixParserService.name);

  /**
   * Reads one bundle document from a stream. The envelope must be valid;
   * objects inside it are validated one by one and the ones that fail are
   * reported in `invalid` instead of failing the whole document.
   */
  async parseDocument(source: Readable): Promise<ParsedBundle> {
    const values: unknown[] = [];
    const collector = new Transform({
      objectMode: true,
      transform: (chunk: { value: unknown }, _encoding: BufferEncoding, callback: TransformCallback) => {
        values.push(chunk.value);
        callback();
      },
    });

    try {
      await pipeline(source, StreamJSON.parser(), streamValues(), collector);
    } catch (error) {
      throw new StixParseError(`malformed JSON document: ${errorMessage(error)}`);
    }
    if (values.length === 0) {
      throw new StixParseError('document is empty');
    }
    return this.parseBundle(values[0]);
  }

  parseBundle(value: unknown): ParsedBundle {
    const { error, value: envelope } = bundleSchema.validate(value, VALIDATION_OPTIONS);
    if (error) {
      throw new StixValidationError(
        'not a STIX bundle',
        error.details.map((d) => d.message),
      );
    }

    const objects: StixObject[] = [];
    const invalid: InvalidObject[] = [];
    envelope.objects.forEach((candidate, index) => {
      try {
        objects.push(this.parseValue(candidate));
      } catch (err) {
        if (!(err instanceof StixLoaderError)) {
          throw err;
        }
        invalid.push({ index, error: err });
      }
    });
    this.logger.debug(`bundle ${envelope.id}: ${objects.length} objects, ${invalid.length} invalid`);
    return { id: envelope.id, objects, invalid };
  }

  /** Parses one line of a line-delimited stream. */
  parseObject(line: string): StixObject {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      throw new StixParseError(`malformed JSON: ${errorMessage(error)}`);
    }
    return this.parseValue(value);
  }

  parseValue(value: unknown): StixObject {
    if (!isRecord(value) || typeof value.type !== 'string') {
      throw new StixValidationError('value is not a STIX object: missing type');
    }
    const id = typeof value.id === 'string' ? value.id : '<no id>';
    const schema = schemaFor(value.type);
    if (!schema) {
      throw new StixValidationError(`unsupported STIX type ${value.type} (${id})`);
    }
    const result = schema.validate(value, VALIDATION_OPTIONS);
    if (result.error) {
      throw new StixValidationError(
        `invalid ${value.type} ${id}`,
        result.error.details.map((d) => d.message),
      );
    }
    return result.value;
  }
}
