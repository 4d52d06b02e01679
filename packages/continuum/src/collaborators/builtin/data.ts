/**
 * In-process data collaborators
 *
 * The describer records a JSON document's shape; the generator expands
 * it back. Non-JSON bytes get a fingerprint description and no
 * reconstruction.
 */

import type { Description, MediaItem } from '../../types/index.js';
import { hashContent } from '../../utils/hash.js';
import type { DescribeResult, DescribeService, GenerateService } from '../types.js';
import { expandShape, inferShape, isJsonObject, isShapeNode, parseJson, renderShape } from './shape.js';
import type { ShapeNode } from './shape.js';

interface JsonStructure {
  format: 'json';
  shape: ShapeNode;
}

function isJsonStructure(value: unknown): value is JsonStructure {
  return isJsonObject(value) && value['format'] === 'json' && isShapeNode(value['shape']);
}

export class SchemaDescriber implements DescribeService {
  readonly name = 'builtin-schema';

  async probe(): Promise<boolean> {
    return true;
  }

  async describe(media: MediaItem): Promise<DescribeResult> {
    const parsed = parseJson(media.bytes);
    if (parsed === undefined) {
      return {
        text: `binary data: ${media.bytes.length} bytes, sha256 ${hashContent(media.bytes)}`,
        structured: { format: 'binary', length: media.bytes.length },
      };
    }
    const shape = inferShape(parsed);
    const structured: JsonStructure = { format: 'json', shape };
    return { text: `json ${renderShape(shape)}`, structured };
  }
}

export class ExemplarGenerator implements GenerateService {
  readonly name = 'builtin-exemplar';

  async probe(): Promise<boolean> {
    return true;
  }

  async generate(description: Description): Promise<Buffer> {
    if (!isJsonStructure(description.structured)) {
      throw new Error('no reconstruction for non-JSON data');
    }
    return Buffer.from(JSON.stringify(expandShape(description.structured.shape)), 'utf8');
  }
}
