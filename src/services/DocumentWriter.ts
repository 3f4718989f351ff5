import { writeFile } from 'fs/promises';
import { join } from 'path';
import { OperationType } from '../types/index.js';
import type { OperationSink } from './OperationLog.js';
import { writeZip } from './ArchiveService.js';
import { isDirectory } from '../lib/fsUtils.js';
import { FileOperationError, NotFoundError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';

/** ftyp box of an otherwise empty MP4. */
export const MP4_PLACEHOLDER_HEADER = Buffer.from([
  0x00, 0x00, 0x00, 0x18, 0x66, 0x74, 0x79, 0x70, 0x6d, 0x70, 0x34, 0x32,
  0x00, 0x00, 0x00, 0x00, 0x6d, 0x70, 0x34, 0x32, 0x69, 0x73, 0x6f, 0x6d,
]);

const CONTENT_TYPES_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
<Default Extension="xml" ContentType="application/xml"/>
<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`;

const PACKAGE_RELS_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** WordprocessingML body with one paragraph per line of `content`. */
export function buildDocumentXml(content: string): string {
  const paragraphs = content
    .split(/\r?\n/)
    .map((line) => `<w:p><w:r><w:t xml:space="preserve">${escapeXml(line)}</w:t></w:r></w:p>`)
    .join('');

  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${paragraphs}</w:body></w:document>`;
}

/**
 * Placeholder text, Word and video files.
 */
export class DocumentWriter {
  private operations: OperationSink;

  constructor(operations: OperationSink) {
    this.operations = operations;
  }

  async createTextFile(directory: string, name: string, content = ''): Promise<string> {
    const fullPath = join(directory, `${name}.txt`);
    await this.write(fullPath, directory, () => writeFile(fullPath, content, 'utf8'));
    await this.operations.record(OperationType.CREATE_TEXT_FILE, { path: fullPath, content });
    return fullPath;
  }

  async createWordFile(directory: string, name: string, content = ''): Promise<string> {
    const fullPath = join(directory, `${name}.docx`);
    await this.write(fullPath, directory, () =>
      writeZip(fullPath, (archive) => {
        archive.append(CONTENT_TYPES_XML, { name: '[Content_Types].xml' });
        archive.append(PACKAGE_RELS_XML, { name: '_rels/.rels' });
        archive.append(buildDocumentXml(content), { name: 'word/document.xml' });
      })
    );
    await this.operations.record(OperationType.CREATE_WORD_FILE, { path: fullPath, content });
    return fullPath;
  }

  async createVideoFile(directory: string, name: string): Promise<string> {
    const fullPath = join(directory, `${name}.mp4`);
    await this.write(fullPath, directory, () => writeFile(fullPath, MP4_PLACEHOLDER_HEADER));
    await this.operations.record(OperationType.CREATE_VIDEO_FILE, { path: fullPath });
    return fullPath;
  }

  private async write(fullPath: string, directory: string, produce: () => Promise<void>): Promise<void> {
    const logger = createChildLogger({ filePath: fullPath });

    if (!(await isDirectory(directory))) {
      logger.error('Parent directory does not exist');
      throw new NotFoundError(`Directory does not exist: ${directory}`, { directory });
    }

    try {
      await produce();
    } catch (error) {
      logger.error({ error }, 'Error creating file');
      throw new FileOperationError(`Error creating file ${fullPath}`, { path: fullPath }, error);
    }

    logger.info('File created');
  }
}
