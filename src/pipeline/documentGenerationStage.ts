import { describeError, isPipelineError, PipelineError } from '../lib/pipelineErrors.js';
import type { DocumentArtifact, SoapNote } from '../repositories/contracts.js';
import { boundedCall } from './boundedCall.js';
import type { StageCallOptions } from './boundedCall.js';
import type { DocumentCapability, DocumentReference, RenderedSection } from './capabilities.js';

export const SECTION_HEADINGS: ReadonlyArray<Pick<RenderedSection, 'key' | 'heading'>> = [
  { key: 'subjective', heading: 'SUBJETIVO (S)' },
  { key: 'objective', heading: 'OBJETIVO (O)' },
  { key: 'assessment', heading: 'EVALUACIÓN (A)' },
  { key: 'plan', heading: 'PLAN (P)' }
];

export const EMPTY_SECTION_PLACEHOLDER = 'Sin información registrada.';

export type StructuredSoapExport = {
  subjective: string;
  objective: string;
  assessment: string;
  plan: string;
};

export type DocumentMetadata = {
  sessionId: string;
  title: string;
};

export type DocumentGenerationStageOptions = {
  timeoutMs: number;
  now?: () => Date;
};

export interface DocumentGenerationStage {
  generate(note: SoapNote, metadata: DocumentMetadata, options?: StageCallOptions): Promise<DocumentArtifact>;
  exportStructured(note: SoapNote): StructuredSoapExport;
}

export function exportStructured(note: SoapNote): StructuredSoapExport {
  return {
    subjective: note.subjective,
    objective: note.objective,
    assessment: note.assessment,
    plan: note.plan
  };
}

export function serializeStructuredExport(note: SoapNote): string {
  return JSON.stringify(exportStructured(note), null, 2);
}

export function renderSections(note: SoapNote): RenderedSection[] {
  return SECTION_HEADINGS.map(({ key, heading }) => ({
    key,
    heading,
    body: note[key].trim() || EMPTY_SECTION_PLACEHOLDER
  }));
}

function pad(value: number) {
  return String(value).padStart(2, '0');
}

export function defaultDocumentTitle(patientName: string | null, at: Date): string {
  const stamp = `${at.getUTCFullYear()}-${pad(at.getUTCMonth() + 1)}-${pad(at.getUTCDate())} ${pad(
    at.getUTCHours()
  )}:${pad(at.getUTCMinutes())}`;
  return `Nota Clínica - ${patientName?.trim() || 'Paciente'} - ${stamp}`;
}

export function createDocumentGenerationStage(
  capability: DocumentCapability,
  options: DocumentGenerationStageOptions
): DocumentGenerationStage {
  const now = options.now ?? (() => new Date());

  return {
    exportStructured,

    async generate(note, metadata, callOptions) {
      let reference: DocumentReference;
      try {
        reference = await boundedCall(
          (signal) =>
            capability.createDocument({
              title: metadata.title,
              sessionId: metadata.sessionId,
              sections: renderSections(note),
              signal
            }),
          {
            stage: 'generating_document',
            timeoutMs: options.timeoutMs,
            signal: callOptions?.signal,
            label: `document generation via ${capability.name}`
          }
        );
      } catch (error) {
        if (isPipelineError(error)) {
          throw error.withStage('generating_document');
        }
        throw new PipelineError('GENERATION_FAILED', `document generation failed: ${describeError(error)}`, {
          stage: 'generating_document',
          cause: error
        });
      }

      if (!reference.documentId.trim() || !reference.link.trim()) {
        throw new PipelineError('GENERATION_FAILED', 'document provider returned no document reference', {
          stage: 'generating_document'
        });
      }

      return {
        documentId: reference.documentId,
        link: reference.link,
        title: metadata.title,
        generatedAt: now().toISOString()
      };
    }
  };
}
