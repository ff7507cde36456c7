import { BlockedReason, GenerateContentResponse } from '@google/genai';
import type { GenerateContentParameters } from '@google/genai';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createTranscriptionStage } from '../src/pipeline/transcriptionStage.js';
import { createAssemblyAiTranscription, toTranscriptionPoll } from '../src/providers/assemblyAi.js';
import { createGeminiExtraction } from '../src/providers/gemini.js';
import { requestJson } from '../src/providers/http.js';
import type { AudioAsset } from '../src/repositories/contracts.js';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

function stubFetch() {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function requestAt(fetchMock: ReturnType<typeof stubFetch>, index: number) {
  const [input, init] = fetchMock.mock.calls[index];
  const body = init?.body;
  return {
    url: String(input),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: typeof body === 'string' ? JSON.parse(body) : body
  };
}

const asset: AudioAsset = {
  assetId: 'asset-1',
  format: 'mp3',
  mimeType: 'audio/mpeg',
  sizeBytes: 3,
  durationMs: null,
  createdAt: '2026-03-14T09:00:00.000Z'
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('provider HTTP calls', () => {
  it('treats throttling and server errors as a temporarily unavailable provider', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({}, 429)).mockResolvedValueOnce(jsonResponse({}, 502));
    const options = { provider: 'Example', failureCode: 'EXTRACTION_FAILED' as const };
    const signal = new AbortController().signal;

    await expect(requestJson('https://api.example.test/a', { signal }, options)).rejects.toMatchObject({
      code: 'PROVIDER_UNAVAILABLE',
      message: 'Example responded with status 429'
    });
    await expect(requestJson('https://api.example.test/a', { signal }, options)).rejects.toMatchObject({
      code: 'PROVIDER_UNAVAILABLE'
    });
  });

  it('reports rejected requests and network errors with their causes', async () => {
    const fetchMock = stubFetch();
    fetchMock
      .mockResolvedValueOnce(new Response('invalid model', { status: 400 }))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('<html>', { status: 200 }));
    const options = { provider: 'Example', failureCode: 'TRANSCRIPTION_FAILED' as const };
    const signal = new AbortController().signal;

    await expect(requestJson('https://api.example.test/a', { signal }, options)).rejects.toMatchObject({
      code: 'TRANSCRIPTION_FAILED',
      message: 'Example rejected the request (400): invalid model'
    });
    await expect(requestJson('https://api.example.test/a', { signal }, options)).rejects.toMatchObject({
      code: 'PROVIDER_UNAVAILABLE',
      message: 'Example is unreachable: fetch failed'
    });
    await expect(requestJson('https://api.example.test/a', { signal }, options)).rejects.toMatchObject({
      code: 'TRANSCRIPTION_FAILED',
      message: 'Example returned a body that is not JSON'
    });
  });
});

describe('AssemblyAI transcription', () => {
  it('maps job states and units onto transcription polls', () => {
    expect(toTranscriptionPoll({ status: 'queued' })).toEqual({ status: 'pending' });
    expect(toTranscriptionPoll({ status: 'error', error: 'file does not appear to contain audio' })).toEqual({
      status: 'error',
      error: 'file does not appear to contain audio'
    });
    expect(
      toTranscriptionPoll({
        status: 'completed',
        text: 'Hola doctor',
        confidence: 0.88,
        audio_duration: 2.5,
        words: [{}, {}],
        utterances: [{ speaker: 'A', text: 'Hola doctor', confidence: 0.88, start: 100, end: 900 }]
      })
    ).toEqual({
      status: 'completed',
      text: 'Hola doctor',
      confidence: 0.88,
      audioDurationMs: 2500,
      wordCount: 2,
      utterances: [{ speaker: 'A', text: 'Hola doctor', confidence: 0.88, startMs: 100, endMs: 900 }]
    });
  });

  it('uploads, submits a Spanish job and polls it to completion', async () => {
    const fetchMock = stubFetch();
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ upload_url: 'https://cdn.example.test/upload/1' }))
      .mockResolvedValueOnce(jsonResponse({ id: 'tr-1', status: 'queued' }))
      .mockResolvedValueOnce(jsonResponse({ id: 'tr-1', status: 'processing' }))
      .mockResolvedValueOnce(
        jsonResponse({ id: 'tr-1', status: 'completed', text: 'Me duele la garganta', words: [{}, {}, {}, {}] })
      );
    const capability = createAssemblyAiTranscription({ apiKey: 'test-api-key', baseUrl: 'https://stt.example.test/' });
    const stage = createTranscriptionStage(capability, { timeoutMs: 1_000, pollIntervalMs: 1 });

    const transcript = await stage.transcribe(asset, Buffer.from('ID3'));

    expect(transcript).toMatchObject({ text: 'Me duele la garganta', wordCount: 4 });
    expect(fetchMock).toHaveBeenCalledTimes(4);

    const upload = requestAt(fetchMock, 0);
    expect(upload.url).toBe('https://stt.example.test/v2/upload');
    expect(upload.headers.get('authorization')).toBe('test-api-key');

    const submit = requestAt(fetchMock, 1);
    expect(submit.url).toBe('https://stt.example.test/v2/transcript');
    expect(submit.body).toEqual({
      audio_url: 'https://cdn.example.test/upload/1',
      language_code: 'es',
      punctuate: true,
      format_text: true,
      speaker_labels: true
    });

    expect(requestAt(fetchMock, 3)).toMatchObject({ url: 'https://stt.example.test/v2/transcript/tr-1', method: 'GET' });
  });
});

describe('Gemini extraction', () => {
  function fakeClient() {
    const generateContent = vi.fn<(params: GenerateContentParameters) => Promise<GenerateContentResponse>>();
    return { client: { models: { generateContent } }, generateContent };
  }

  function responseWith(fields: Partial<Pick<GenerateContentResponse, 'candidates' | 'promptFeedback'>>) {
    return Object.assign(new GenerateContentResponse(), fields);
  }

  const request = { instruction: 'x', transcript: 'y', signal: new AbortController().signal };

  it('sends the instruction and transcript and joins the candidate text', async () => {
    const { client, generateContent } = fakeClient();
    generateContent.mockResolvedValueOnce(
      responseWith({ candidates: [{ content: { parts: [{ text: '{"plan": ' }, { text: '"Reposo"}' }] } }] })
    );
    const capability = createGeminiExtraction({ apiKey: 'test-api-key', model: 'gemini-test', client });
    const signal = new AbortController().signal;

    const text = await capability.complete({
      instruction: 'Genera una nota SOAP',
      transcript: 'Hablante A: Reposo',
      signal
    });

    expect(text).toBe('{"plan": "Reposo"}');
    expect(capability.name).toBe('Gemini gemini-test');
    expect(generateContent).toHaveBeenCalledWith({
      model: 'gemini-test',
      contents: 'TRANSCRIPCIÓN:\nHablante A: Reposo',
      config: {
        systemInstruction: 'Genera una nota SOAP',
        temperature: 0.1,
        topP: 0.95,
        topK: 40,
        maxOutputTokens: 2048,
        responseMimeType: 'application/json',
        abortSignal: signal
      }
    });
  });

  it('fails extraction when the prompt is blocked or no text comes back', async () => {
    const { client, generateContent } = fakeClient();
    generateContent
      .mockResolvedValueOnce(responseWith({ promptFeedback: { blockReason: BlockedReason.SAFETY } }))
      .mockResolvedValueOnce(responseWith({ candidates: [] }));
    const capability = createGeminiExtraction({ apiKey: 'test-api-key', model: 'gemini-test', client });

    await expect(capability.complete(request)).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      message: 'Gemini blocked the request: SAFETY'
    });
    await expect(capability.complete(request)).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      message: 'Gemini returned no text'
    });
  });

  it('maps SDK errors onto transient and definitive failures', async () => {
    const { client, generateContent } = fakeClient();
    generateContent
      .mockRejectedValueOnce(Object.assign(new Error('quota exceeded'), { status: 429 }))
      .mockRejectedValueOnce(Object.assign(new Error('backend error'), { status: 503 }))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockRejectedValueOnce(Object.assign(new Error('API key not valid'), { status: 400 }));
    const capability = createGeminiExtraction({ apiKey: 'test-api-key', model: 'gemini-test', client });

    await expect(capability.complete(request)).rejects.toMatchObject({
      code: 'PROVIDER_UNAVAILABLE',
      message: 'Gemini responded with status 429'
    });
    await expect(capability.complete(request)).rejects.toMatchObject({
      code: 'PROVIDER_UNAVAILABLE',
      message: 'Gemini responded with status 503'
    });
    await expect(capability.complete(request)).rejects.toMatchObject({
      code: 'PROVIDER_UNAVAILABLE',
      message: 'Gemini is unreachable: fetch failed'
    });
    await expect(capability.complete(request)).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      message: 'Gemini rejected the request: API key not valid'
    });
  });

  it('lets an aborted call surface as-is', async () => {
    const { client, generateContent } = fakeClient();
    const controller = new AbortController();
    const aborted = new Error('This operation was aborted');
    generateContent.mockImplementationOnce(async () => {
      controller.abort();
      throw aborted;
    });
    const capability = createGeminiExtraction({ apiKey: 'test-api-key', model: 'gemini-test', client });

    await expect(capability.complete({ ...request, signal: controller.signal })).rejects.toBe(aborted);
  });
});
