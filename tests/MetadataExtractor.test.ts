/**
 * Metadata Extractor Tests
 *
 * Strategy selection (direct, two-call, low-confidence fallback), response
 * parsing and outcome tagging against a scripted chat client.
 */

import { describeMetadata, MetadataExtractor, StrategySettings } from '../src/core/MetadataExtractor.js';
import type { TextReader } from '../src/documents/documentReader.js';
import { buildMarkdown, MarkdownStore } from '../src/documents/markdownArchive.js';
import { DocumentReadError } from '../src/utils/errors.js';
import {
  blobItem,
  FakeChatClient,
  localItem,
  modelAnswer,
  sampleMetadata,
  userMessage,
} from './helpers.js';

const NOW = new Date('2025-03-01T10:00:00.000Z');

const SETTINGS: StrategySettings = {
  useTwoCallForPdfs: true,
  alwaysUseTwoCall: false,
  translateOnLowConfidence: true,
  saveMarkdown: true,
};

function textReader(text: string): TextReader {
  return { read: async () => text };
}

function answer(overrides: Record<string, string | null> = {}): string {
  return JSON.stringify(modelAnswer(overrides));
}

function buildExtractor(
  chat: FakeChatClient,
  options: { text?: string; settings?: Partial<StrategySettings>; markdownStore?: MarkdownStore } = {}
): MetadataExtractor {
  return new MetadataExtractor({
    chat,
    reader: textReader(options.text ?? 'Avtal mellan Nordic Freight AB och Example Holdings'),
    settings: { ...SETTINGS, ...options.settings },
    markdownStore: options.markdownStore,
    now: () => NOW,
  });
}

describe('MetadataExtractor', () => {
  describe('direct extraction', () => {
    it('should extract in a single call', async () => {
      const chat = new FakeChatClient([answer()]);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome).toEqual({
        status: 'success',
        payload: sampleMetadata(),
      });
      expect(chat.requests).toHaveLength(1);
      expect(chat.requests[0]).toMatchObject({ json: true, maxCompletionTokens: 1000 });
      expect(userMessage(chat.requests[0])).toContain('FILE NAME: avtal.txt');
    });

    it('should send at most 8000 characters of contract text', async () => {
      const chat = new FakeChatClient([answer()]);

      await buildExtractor(chat, { text: 'x'.repeat(9000) }).extract(localItem('avtal.txt'));

      const content = userMessage(chat.requests[0]);
      expect(content).toContain('x'.repeat(8000));
      expect(content).not.toContain('x'.repeat(8001));
    });

    it('should fill defaults for missing indicators and file name', async () => {
      const reply = modelAnswer({ 'Original File Name': null });
      delete reply.source_language;
      delete reply.confidence;
      delete reply.extraction_notes;
      const chat = new FakeChatClient([JSON.stringify(reply)]);

      const outcome = await buildExtractor(chat, { settings: { translateOnLowConfidence: false } }).extract(
        blobItem('2024/q1/umowa.txt')
      );

      expect(outcome.status).toBe('success');
      if (outcome.status !== 'success') return;
      expect(outcome.payload.fields['Original File Name']).toBe('umowa.txt');
      expect(outcome.payload.sourceLanguage).toBe('unknown');
      expect(outcome.payload.confidence).toBe('medium');
      expect(outcome.payload.notes).toBe('');
    });

    it('should keep the real file name when the model invents one', async () => {
      const chat = new FakeChatClient([answer({ 'Original File Name': 'Supply Agreement 2024.pdf' })]);

      const outcome = await buildExtractor(chat).extract(localItem('avtal_42.txt'));

      expect(outcome.status).toBe('success');
      if (outcome.status !== 'success') return;
      expect(outcome.payload.fields['Original File Name']).toBe('avtal_42.txt');
      expect(userMessage(chat.requests[0])).toContain('FILE NAME: avtal_42.txt');
    });

    it('should accept JSON wrapped in a code fence', async () => {
      const chat = new FakeChatClient(['```json\n' + answer() + '\n```']);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome.status).toBe('success');
    });
  });

  describe('two-call extraction', () => {
    it('should translate PDFs before extracting', async () => {
      const chat = new FakeChatClient(['Agreement between Nordic Freight AB and Example Holdings', answer()]);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.pdf'));

      const expected = sampleMetadata({ extractionMethod: 'two_call_translation' });
      expected.fields['Original File Name'] = 'avtal.pdf';
      expect(outcome).toEqual({ status: 'success', payload: expected });
      expect(chat.requests[0]).toMatchObject({ json: false, maxCompletionTokens: 16000 });
      expect(chat.requests[1]).toMatchObject({ json: true, maxCompletionTokens: 1500 });
      expect(userMessage(chat.requests[1])).toContain('Agreement between Nordic Freight AB and Example Holdings');
    });

    it('should choose the strategy from the settings', () => {
      const chat = new FakeChatClient([]);

      expect(buildExtractor(chat).usesTwoCall(localItem('a.pdf'))).toBe(true);
      expect(buildExtractor(chat).usesTwoCall(localItem('a.docx'))).toBe(false);
      expect(buildExtractor(chat, { settings: { useTwoCallForPdfs: false } }).usesTwoCall(localItem('a.pdf'))).toBe(
        false
      );
      expect(buildExtractor(chat, { settings: { alwaysUseTwoCall: true } }).usesTwoCall(localItem('a.txt'))).toBe(
        true
      );
    });
  });

  describe('low-confidence fallback', () => {
    it('should re-extract from a translation when confidence is low', async () => {
      const chat = new FakeChatClient([
        answer({ confidence: 'low', 'Effective Date': null }),
        'Transport agreement',
        answer(),
      ]);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome).toEqual({
        status: 'success',
        payload: sampleMetadata({ extractionMethod: 'low_confidence_translation' }),
      });
      expect(chat.requests).toHaveLength(3);
    });

    it('should re-extract when a critical field is missing', async () => {
      const chat = new FakeChatClient([answer({ 'Contract Type': '' }), 'Transport agreement', answer()]);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome.status === 'success' && outcome.payload.extractionMethod).toBe('low_confidence_translation');
    });

    it('should keep the direct answer when the fallback is disabled', async () => {
      const chat = new FakeChatClient([answer({ confidence: 'low' })]);

      const outcome = await buildExtractor(chat, { settings: { translateOnLowConfidence: false } }).extract(
        localItem('avtal.txt')
      );

      expect(outcome).toEqual({
        status: 'success',
        payload: sampleMetadata({ confidence: 'low' }),
      });
      expect(chat.requests).toHaveLength(1);
    });

    it('should keep the direct answer when the translation finds fewer critical fields', async () => {
      const chat = new FakeChatClient([
        answer({ confidence: 'low', extraction_notes: 'Scanned copy' }),
        'Transport agreement',
        answer({ 'Effective Date': null, 'Contract Type': null }),
      ]);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome).toEqual({
        status: 'success',
        payload: sampleMetadata({
          confidence: 'low',
          notes: 'Scanned copy; Translation fallback produced fewer critical fields; kept direct extraction',
        }),
      });
    });

    it('should keep the direct answer with a note when the fallback fails', async () => {
      const chat = new FakeChatClient([answer({ confidence: 'low' }), new Error('Invalid request')]);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome).toEqual({
        status: 'success',
        payload: sampleMetadata({ confidence: 'low', notes: 'Translation fallback failed: Invalid request' }),
      });
    });

    it('should surface a rate limit hit during the fallback as retryable', async () => {
      const chat = new FakeChatClient([
        answer({ confidence: 'low' }),
        Object.assign(new Error('Too many requests'), { status: 429 }),
      ]);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome).toEqual({ status: 'retryable', reason: 'Too many requests (Rate limit detected)' });
    });
  });

  describe('failures', () => {
    it('should fail fatally on an unreadable response', async () => {
      const chat = new FakeChatClient(['I could not find any metadata.']);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome).toEqual({
        status: 'fatal',
        reason: 'JSON parse error: Could not extract valid JSON from response content',
      });
    });

    it('should fail fatally on a response that breaks the schema', async () => {
      const chat = new FakeChatClient([JSON.stringify({ ...modelAnswer(), 'Contract Type': 42 })]);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome.status).toBe('fatal');
      expect(outcome.status !== 'success' && outcome.reason).toMatch(
        /^Invalid metadata response: \/Contract Type: must be/
      );
    });

    it('should fail fatally on a JSON array', async () => {
      const chat = new FakeChatClient(['[1, 2]']);

      const outcome = await buildExtractor(chat).extract(localItem('avtal.txt'));

      expect(outcome.status).toBe('fatal');
      expect(outcome.status !== 'success' && outcome.reason).toMatch(/^Invalid metadata response: /);
    });

    it('should pass read errors through without calling the model', async () => {
      const chat = new FakeChatClient([answer()]);
      const extractor = new MetadataExtractor({
        chat,
        reader: {
          read: async () => {
            throw new DocumentReadError('Unsupported file format: .rtf');
          },
        },
        settings: SETTINGS,
      });

      await expect(extractor.extract(localItem('a.rtf'))).resolves.toEqual({
        status: 'fatal',
        reason: 'Unsupported file format: .rtf',
      });
      expect(chat.requests).toHaveLength(0);
    });

    it('should mark a rate-limited call as retryable', async () => {
      const chat = new FakeChatClient([Object.assign(new Error('Request failed'), { status: 429 })]);

      await expect(buildExtractor(chat).extract(localItem('avtal.txt'))).resolves.toEqual({
        status: 'retryable',
        reason: 'Request failed (Rate limit detected)',
      });
    });
  });

  describe('markdown archive', () => {
    function recordingStore(): MarkdownStore & { saved: Array<[string, string]> } {
      const saved: Array<[string, string]> = [];
      return {
        saved,
        save: async (name, content) => {
          saved.push([name, content]);
        },
      };
    }

    it('should save extracted text of blob documents', async () => {
      const store = recordingStore();
      const chat = new FakeChatClient([answer()]);

      await buildExtractor(chat, { text: 'Avtal', markdownStore: store }).extract(blobItem('2024/avtal.txt'));

      expect(store.saved).toEqual([['2024/avtal.md', buildMarkdown('Avtal', '2024/avtal.txt', NOW)]]);
    });

    it('should not save local documents or when disabled', async () => {
      const store = recordingStore();

      await buildExtractor(new FakeChatClient([answer()]), { markdownStore: store }).extract(localItem('avtal.txt'));
      await buildExtractor(new FakeChatClient([answer()]), {
        markdownStore: store,
        settings: { saveMarkdown: false },
      }).extract(blobItem('avtal.txt'));

      expect(store.saved).toEqual([]);
    });

    it('should still succeed when the upload fails', async () => {
      const store: MarkdownStore = {
        save: async () => {
          throw new Error('ContainerBeingDeleted');
        },
      };

      const outcome = await buildExtractor(new FakeChatClient([answer()]), { markdownStore: store }).extract(
        blobItem('avtal.txt')
      );

      expect(outcome.status).toBe('success');
    });
  });
});

describe('describeMetadata', () => {
  it('should summarize high-confidence results on one line', () => {
    expect(describeMetadata(sampleMetadata())).toEqual({ summary: 'SV, high' });
  });

  it('should add the contract name and quality issues otherwise', () => {
    const metadata = sampleMetadata({ confidence: 'medium', sourceLanguage: 'pl' });
    metadata.fields['Contract Name'] = null;
    metadata.fields['Effective Date'] = '';

    expect(describeMetadata(metadata)).toEqual({
      summary: 'PL, medium',
      details: [
        '📋 Contract: N/A',
        '⚠️  Quality Issues: Missing: Effective Date, Missing: Contract Name, Missing: Related Master Agreement',
      ],
    });
  });
});
