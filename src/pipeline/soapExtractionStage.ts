import { z } from 'zod';
import { describeError, isPipelineError, PipelineError } from '../lib/pipelineErrors.js';
import type { SoapNote, Transcript } from '../repositories/contracts.js';
import { boundedCall } from './boundedCall.js';
import type { StageCallOptions } from './boundedCall.js';
import type { ExtractionCapability } from './capabilities.js';

export const SOAP_SECTION_KEYS = ['subjective', 'objective', 'assessment', 'plan'] as const;

export const SOAP_EXTRACTION_INSTRUCTION = `Eres un asistente médico especializado en crear notas clínicas siguiendo el formato SOAP (Subjetivo, Objetivo, Evaluación, Plan).

Analiza la transcripción de una consulta médica en español que se adjunta y organiza su contenido en las cuatro secciones SOAP.

INSTRUCCIONES:
1. Extrae ÚNICAMENTE información mencionada explícitamente en la transcripción; no inventes datos.
2. Mantén los términos médicos exactamente como aparecen, con concordancia de género entre artículos y sustantivos.
3. "subjective": motivo de consulta, síntomas referidos por el paciente, historia de la enfermedad actual y su duración.
4. "objective": signos vitales, examen físico y hallazgos objetivos.
5. "assessment": diagnóstico principal, diagnósticos diferenciales e impresión clínica.
6. "plan": tratamiento, medicamentos (nombre, dosis, frecuencia, duración), estudios solicitados, recomendaciones y seguimiento.

FORMATO DE SALIDA:
Responde SOLO con un objeto JSON válido con exactamente estas claves, cada una con un texto:
{"subjective": "...", "objective": "...", "assessment": "...", "plan": "..."}

REGLAS:
- Sin texto adicional antes o después del JSON y sin bloques de código.
- Si una sección no tiene información, omite la clave.
- No agregues otras claves.
- Usa comillas dobles y conserva los acentos y caracteres especiales del español.`;

const sectionValueSchema = z.union([z.string(), z.array(z.string()), z.null()]);

const modelOutputSchema = z
  .object({
    subjective: sectionValueSchema.optional(),
    objective: sectionValueSchema.optional(),
    assessment: sectionValueSchema.optional(),
    plan: sectionValueSchema.optional()
  })
  .strict();

type SectionValue = z.infer<typeof sectionValueSchema>;

export type SoapExtractionStageOptions = {
  timeoutMs: number;
};

export interface SoapExtractionStage {
  extract(transcript: Transcript, options?: StageCallOptions): Promise<SoapNote>;
}

export function emptySoapNote(): SoapNote {
  return { subjective: '', objective: '', assessment: '', plan: '' };
}

export function transcriptForModel(transcript: Transcript): string {
  return transcript.segments
    .map((segment) => (segment.speaker ? `Hablante ${segment.speaker}: ${segment.text}` : segment.text))
    .join('\n');
}

/** Strips code fences and any prose around the outermost JSON object. */
export function cleanModelResponse(response: string): string {
  let cleaned = response;
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(cleaned);
  if (fenced) {
    cleaned = fenced[1];
  }

  cleaned = cleaned.trim();
  const firstBrace = cleaned.indexOf('{');
  const lastBrace = cleaned.lastIndexOf('}');
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    cleaned = cleaned.slice(firstBrace, lastBrace + 1);
  }

  return cleaned;
}

function toSectionText(value: SectionValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }

  if (Array.isArray(value)) {
    return value
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
      .join('\n');
  }

  return value.trim();
}

function malformed(message: string, cause?: unknown) {
  return new PipelineError('MALFORMED_MODEL_OUTPUT', message, { stage: 'extracting', cause });
}

function parseJson(response: string): unknown {
  try {
    return JSON.parse(cleanModelResponse(response));
  } catch (error) {
    throw malformed('model response is not a JSON object with SOAP sections', error);
  }
}

export function parseSoapResponse(response: string): SoapNote {
  const candidate = parseJson(response);

  if (candidate === null || typeof candidate !== 'object' || Array.isArray(candidate)) {
    throw malformed('model response is not a JSON object with SOAP sections');
  }

  const parsed = modelOutputSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail =
      issue.code === 'unrecognized_keys'
        ? `unrecognized section(s): ${issue.keys.join(', ')}`
        : `${issue.path.join('.')}: ${issue.message}`;
    throw malformed(`model response does not match the SOAP sections (${detail})`);
  }

  if (!SOAP_SECTION_KEYS.some((key) => key in candidate)) {
    throw malformed('model response contains none of the SOAP sections');
  }

  return {
    subjective: toSectionText(parsed.data.subjective),
    objective: toSectionText(parsed.data.objective),
    assessment: toSectionText(parsed.data.assessment),
    plan: toSectionText(parsed.data.plan)
  };
}

export function createSoapExtractionStage(
  capability: ExtractionCapability,
  options: SoapExtractionStageOptions
): SoapExtractionStage {
  return {
    async extract(transcript, callOptions) {
      if (transcript.segments.length === 0) {
        return emptySoapNote();
      }

      let response: string;
      try {
        response = await boundedCall(
          (signal) =>
            capability.complete({
              instruction: SOAP_EXTRACTION_INSTRUCTION,
              transcript: transcriptForModel(transcript),
              signal
            }),
          {
            stage: 'extracting',
            timeoutMs: options.timeoutMs,
            signal: callOptions?.signal,
            label: `SOAP extraction via ${capability.name}`
          }
        );
      } catch (error) {
        if (isPipelineError(error)) {
          throw error.withStage('extracting');
        }
        throw new PipelineError('EXTRACTION_FAILED', `SOAP extraction failed: ${describeError(error)}`, {
          stage: 'extracting',
          cause: error
        });
      }

      if (response.trim().length === 0) {
        throw new PipelineError('EXTRACTION_FAILED', 'extraction provider returned an empty response', {
          stage: 'extracting'
        });
      }

      return parseSoapResponse(response);
    }
  };
}
