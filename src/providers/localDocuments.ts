import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { DocumentCapability, RenderedSection } from '../pipeline/capabilities.js';

export function renderMarkdownDocument(title: string, sections: RenderedSection[]): string {
  const body = sections.map((section) => `## ${section.heading}\n\n${section.body}`).join('\n\n');
  return `# ${title}\n\n${body}\n`;
}

/** Writes each note as `<sessionId>.md` under `directory` and links to it with a file URL. */
export function createLocalDocumentWriter(options: { directory: string }): DocumentCapability {
  const directory = path.resolve(options.directory);

  return {
    name: 'local markdown',

    async createDocument({ title, sessionId, sections, signal }) {
      const documentId = `${sessionId}.md`;
      const filePath = path.join(directory, documentId);

      await mkdir(directory, { recursive: true });
      await writeFile(filePath, renderMarkdownDocument(title, sections), { encoding: 'utf8', signal });

      return { documentId, link: pathToFileURL(filePath).href };
    }
  };
}
