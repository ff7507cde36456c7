import { describe, expect, it } from 'vitest';
import {
  createDocumentGenerationStage,
  defaultDocumentTitle,
  renderSections,
  serializeStructuredExport
} from '../src/pipeline/documentGenerationStage.js';
import { renderMarkdownDocument } from '../src/providers/localDocuments.js';
import type { SoapNote } from '../src/repositories/contracts.js';
import { FIXED_NOW } from './helpers/pipeline.js';
import { recordingDocuments } from './helpers/fakeCapabilities.js';

const note: SoapNote = {
  subjective: 'Paciente refiere dolor de cabeza',
  objective: '',
  assessment: 'Cefalea tensional',
  plan: '  '
};

describe('document generation stage', () => {
  it('renders the four sections in order with Spanish headings and placeholders', () => {
    expect(renderSections(note)).toEqual([
      { key: 'subjective', heading: 'SUBJETIVO (S)', body: 'Paciente refiere dolor de cabeza' },
      { key: 'objective', heading: 'OBJETIVO (O)', body: 'Sin información registrada.' },
      { key: 'assessment', heading: 'EVALUACIÓN (A)', body: 'Cefalea tensional' },
      { key: 'plan', heading: 'PLAN (P)', body: 'Sin información registrada.' }
    ]);
  });

  it('returns the provider reference with the title and generation time', async () => {
    const fake = recordingDocuments();
    const stage = createDocumentGenerationStage(fake.capability, { timeoutMs: 1_000, now: () => FIXED_NOW });

    const artifact = await stage.generate(note, { sessionId: 'sess-1', title: 'Nota Clínica - Ana - 2026-03-14 09:05' });

    expect(artifact).toEqual({
      documentId: 'doc-sess-1',
      link: 'https://docs.example.test/sess-1',
      title: 'Nota Clínica - Ana - 2026-03-14 09:05',
      generatedAt: '2026-03-14T09:05:00.000Z'
    });
    expect(fake.requests[0].sections).toHaveLength(4);
  });

  it('rejects a provider answer without a document reference', async () => {
    const stage = createDocumentGenerationStage(
      { name: 'empty', createDocument: async () => ({ documentId: '', link: '' }) },
      { timeoutMs: 1_000 }
    );

    await expect(stage.generate(note, { sessionId: 'sess-2', title: 'Nota' })).rejects.toMatchObject({
      code: 'GENERATION_FAILED',
      stage: 'generating_document'
    });
  });

  it('exports the structured note byte-identically on every call', () => {
    const first = serializeStructuredExport(note);

    expect(serializeStructuredExport({ ...note })).toBe(first);
    expect(first).toBe(
      [
        '{',
        '  "subjective": "Paciente refiere dolor de cabeza",',
        '  "objective": "",',
        '  "assessment": "Cefalea tensional",',
        '  "plan": "  "',
        '}'
      ].join('\n')
    );
  });

  it('builds the default title in UTC and falls back to a generic patient', () => {
    expect(defaultDocumentTitle('  María López ', FIXED_NOW)).toBe('Nota Clínica - María López - 2026-03-14 09:05');
    expect(defaultDocumentTitle(null, new Date('2026-12-01T23:59:59.000Z'))).toBe(
      'Nota Clínica - Paciente - 2026-12-01 23:59'
    );
  });

  it('renders a markdown document for the local writer', () => {
    expect(renderMarkdownDocument('Nota', renderSections(note).slice(0, 2))).toBe(
      '# Nota\n\n## SUBJETIVO (S)\n\nPaciente refiere dolor de cabeza\n\n## OBJETIVO (O)\n\nSin información registrada.\n'
    );
  });
});
