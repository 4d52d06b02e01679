/**
 * In-process library collaborators
 *
 * The describer keeps the declaration lines of a source file and their
 * positions; the generator rebuilds a skeleton with every other line
 * blank.
 */

import type { Description, MediaItem } from '../../types/index.js';
import type { DescribeResult, DescribeService, GenerateService } from '../types.js';
import { isJsonObject } from './shape.js';

const DECLARATION =
  /^\s*(export\s+)?(default\s+)?(async\s+)?(abstract\s+)?(function|class|interface|type|enum|const|let|def|struct|trait|impl|fn|pub|module|namespace)\b/;

interface Declaration {
  line: number;
  text: string;
}

interface Outline {
  format: 'outline';
  lineCount: number;
  declarations: Declaration[];
}

function isOutline(value: unknown): value is Outline {
  if (!isJsonObject(value) || value['format'] !== 'outline' || typeof value['lineCount'] !== 'number') {
    return false;
  }
  const declarations = value['declarations'];
  return (
    Array.isArray(declarations) &&
    declarations.every(
      (entry: unknown) => isJsonObject(entry) && typeof entry['line'] === 'number' && typeof entry['text'] === 'string'
    )
  );
}

export function outlineSource(source: string): Outline {
  const lines = source.split('\n');
  const declarations: Declaration[] = [];
  lines.forEach((text, line) => {
    if (DECLARATION.test(text)) declarations.push({ line, text });
  });
  return { format: 'outline', lineCount: lines.length, declarations };
}

export class OutlineDescriber implements DescribeService {
  readonly name = 'builtin-outline';

  async probe(): Promise<boolean> {
    return true;
  }

  async describe(media: MediaItem): Promise<DescribeResult> {
    const outline = outlineSource(media.bytes.toString('utf8'));
    const header = `library outline: ${outline.lineCount} lines, ${outline.declarations.length} declarations`;
    const body = outline.declarations.map(d => `${d.line + 1}: ${d.text.trim()}`);
    return { text: [header, ...body].join('\n'), structured: outline };
  }
}

export class SkeletonGenerator implements GenerateService {
  readonly name = 'builtin-skeleton';

  async probe(): Promise<boolean> {
    return true;
  }

  async generate(description: Description): Promise<Buffer> {
    const outline = description.structured;
    if (!isOutline(outline)) {
      throw new Error('description carries no outline');
    }
    const lines = new Array<string>(outline.lineCount).fill('');
    for (const { line, text } of outline.declarations) {
      if (line >= 0 && line < lines.length) lines[line] = text;
    }
    return Buffer.from(lines.join('\n'), 'utf8');
  }
}
