import { describe, expect, it } from '@jest/globals';
import { LegacyDocument } from '../types/migrationTypes';
import { isGuid } from '../utils/guid';
import {
  classifyQuestionEntry,
  inferQuestionType,
  normalizeOption,
  normalizeQuestionSet,
} from './questionNormalizer';

const SET_ID = '0b6f1d2e-8c3a-4e5f-9a7b-1c2d3e4f5a6b';
const QUESTION_ID = '9d8c7b6a-5f4e-4d3c-8b2a-1f0e9d8c7b6a';
const OPTION_ID = '11111111-2222-4333-8444-555555555555';

const FIRST_RUN = new Date('2025-01-15T10:00:00.000Z');
const SECOND_RUN = new Date('2025-01-16T08:30:00.000Z');

// What a document looks like after a round trip through the store
const stored = (doc: unknown): LegacyDocument => JSON.parse(JSON.stringify(doc));

describe('classifyQuestionEntry', () => {
  it('resolves each legacy shape to one tag', () => {
    expect(classifyQuestionEntry({ text: 'Age?' })).toEqual({ kind: 'record', fields: { text: 'Age?' } });
    expect(classifyQuestionEntry('Age?')).toEqual({ kind: 'text', text: 'Age?' });
    expect(classifyQuestionEntry(7)).toEqual({ kind: 'scalar', value: 7 });
  });
});

describe('inferQuestionType', () => {
  it('classifies a non-empty options list as mcq and anything else as text', () => {
    expect(inferQuestionType(['Red'])).toBe('mcq');
    expect(inferQuestionType([])).toBe('text');
    expect(inferQuestionType(undefined)).toBe('text');
  });
});

describe('normalizeOption', () => {
  it('reads the numbered legacy option shape and mints an id', () => {
    const result = normalizeOption({ optionId: 1, option: ' Yes ' }, new Set());
    expect(result?.minted).toBe(true);
    expect(isGuid(result?.option.option_id)).toBe(true);
    expect(result?.option.label).toBe('Yes');
    expect(result?.option.value).toBe('Yes');
  });

  it('keeps a canonical option id and a distinct value', () => {
    const result = normalizeOption({ option_id: OPTION_ID, label: ' Often ', value: 'often' }, new Set());
    expect(result).toEqual({
      option: { option_id: OPTION_ID, label: 'Often', value: 'often' },
      minted: false,
    });
  });

  it('turns scalars into labels and drops null entries', () => {
    expect(normalizeOption(5, new Set())?.option.label).toBe('5');
    expect(normalizeOption(null, new Set())).toBeNull();
  });

  it('keeps a record with no usable label', () => {
    const result = normalizeOption({ option_id: OPTION_ID }, new Set());
    expect(result?.option).toEqual({ option_id: OPTION_ID, label: null, value: null });
  });
});

describe('normalizeQuestionSet', () => {
  it('rewrites a legacy set with bare string options into canonical shape', () => {
    const { document, needsWrite, legacyId } = normalizeQuestionSet(
      {
        _id: 'sq_1a2b3c4d',
        survey_id: 'svy_12345678',
        questions: [{ text: 'Favorite color?', options: ['Red', 'Blue'] }],
      },
      () => FIRST_RUN
    );

    expect(needsWrite).toBe(true);
    expect(legacyId).toBe('sq_1a2b3c4d');
    expect(isGuid(document._id)).toBe(true);
    expect(document.legacy_id).toBe('sq_1a2b3c4d');
    expect(document.survey_id).toBe('svy_12345678');
    expect(document.created_at).toBe('2025-01-15T10:00:00.000Z');
    expect(document.updated_at).toBe('2025-01-15T10:00:00.000Z');

    const [question] = document.questions;
    expect(isGuid(question.question_id)).toBe(true);
    expect(question.question_text).toBe('Favorite color?');
    expect(question.question_type).toBe('mcq');
    expect(question.required).toBe(false);
    expect(question.order).toBe(1);
    expect(question.metadata).toEqual({});
    expect(question.options.map((o) => o.label)).toEqual(['Red', 'Blue']);
    expect(question.options.map((o) => o.value)).toEqual(['Red', 'Blue']);
    expect(question.options[0].option_id).not.toBe(question.options[1].option_id);
    expect(question.options.every((o) => isGuid(o.option_id))).toBe(true);
  });

  it('is a no-op on its own output and keeps every identifier', () => {
    const first = normalizeQuestionSet(
      {
        _id: 'legacy-1',
        surveyId: 'svy_1',
        questions: [
          { q: 'Rate us', choices: [{ option: 'Good' }, { option: 'Bad' }], required: true },
          'Any comments?',
        ],
      },
      () => FIRST_RUN
    );
    const second = normalizeQuestionSet(stored(first.document), () => SECOND_RUN);

    expect(second.needsWrite).toBe(false);
    expect(second.legacyId).toBeUndefined();
    expect(second.document._id).toBe(first.document._id);
    expect(second.document.questions).toEqual(first.document.questions);
    expect(second.document.created_at).toBe('2025-01-15T10:00:00.000Z');
    expect(second.document.updated_at).toBe('2025-01-16T08:30:00.000Z');
  });

  it('needs no write when every identifier is already canonical', () => {
    const { needsWrite, document } = normalizeQuestionSet({
      _id: SET_ID,
      survey_id: 'svy_1',
      created_at: '2024-11-02T09:00:00+05:30',
      questions: [
        {
          question_id: QUESTION_ID,
          question_text: 'Visit again?',
          question_type: 'yes_no',
          options: [{ option_id: OPTION_ID, label: 'Yes', value: 'Yes' }],
          required: false,
          order: 1,
          metadata: {},
        },
      ],
    });

    expect(needsWrite).toBe(false);
    expect(document.created_at).toBe('2024-11-02T09:00:00+05:30');
    expect(document.questions[0].question_id).toBe(QUESTION_ID);
    expect(document.questions[0].options[0].option_id).toBe(OPTION_ID);
    expect(document.questions[0].question_type).toBe('yes_no');
  });

  it('relocates a survey reference stored under a legacy key', () => {
    const { needsWrite, document } = normalizeQuestionSet({
      _id: SET_ID,
      surveyId: 'svy_legacy',
      questions: [{ question_id: QUESTION_ID, text: 'Name?' }],
    });

    expect(needsWrite).toBe(true);
    expect(document.survey_id).toBe('svy_legacy');
  });

  it('accepts only canonical question types and infers the rest', () => {
    const { document } = normalizeQuestionSet({
      _id: SET_ID,
      questions: [
        { text: 'Pick one', type: 'dropdown', options: [] },
        { text: 'Stars', type: 'rating', options: ['1', '2'] },
        { text: 'Age', question_type: 'number' },
        { text: 'Notes', type: 'essay' },
      ],
    });

    expect(document.questions.map((q) => q.question_type)).toEqual([
      'dropdown',
      'mcq',
      'number',
      'text',
    ]);
  });

  it('uses explicit order fields and falls back to input position', () => {
    const { document } = normalizeQuestionSet({
      _id: SET_ID,
      questions: [
        { text: 'a', qno: '5' },
        { text: 'b', order: 0 },
        { text: 'c' },
        { text: 'd', order: 'x' },
        { text: 'e', order: null, qno: 7 },
      ],
    });

    expect(document.questions.map((q) => q.order)).toEqual([5, 0, 3, 4, 7]);
  });

  it('coerces non-record entries into text-only questions', () => {
    const { document, needsWrite } = normalizeQuestionSet({
      _id: SET_ID,
      questions: ['  How old are you? ', 42, null],
    });

    expect(needsWrite).toBe(true);
    expect(document.questions.map((q) => q.question_text)).toEqual(['How old are you?', '42', '']);
    expect(document.questions.every((q) => q.question_type === 'text' && q.options.length === 0)).toBe(true);
    expect(document.questions.map((q) => q.order)).toEqual([1, 2, 3]);
  });

  it('re-mints a duplicated question id', () => {
    const { document, needsWrite } = normalizeQuestionSet({
      _id: SET_ID,
      questions: [
        { question_id: QUESTION_ID, text: 'first' },
        { question_id: QUESTION_ID, text: 'second' },
      ],
    });

    expect(needsWrite).toBe(true);
    expect(document.questions[0].question_id).toBe(QUESTION_ID);
    expect(document.questions[1].question_id).not.toBe(QUESTION_ID);
  });

  it('passes metadata through and reads required flags', () => {
    const { document } = normalizeQuestionSet({
      _id: SET_ID,
      questions: [
        { text: 'a', required: 'true', metadata: { section: 'intro' } },
        { text: 'b', required: 'yes', metadata: 'ignored' },
      ],
    });

    expect(document.questions[0].required).toBe(true);
    expect(document.questions[0].metadata).toEqual({ section: 'intro' });
    expect(document.questions[1].required).toBe(false);
    expect(document.questions[1].metadata).toEqual({});
  });

  it('drops null options but keeps the rest in order', () => {
    const { document } = normalizeQuestionSet({
      _id: SET_ID,
      questions: [{ text: 'Pick', options: ['A', null, { label: 'C' }] }],
    });

    expect(document.questions[0].options.map((o) => o.label)).toEqual(['A', 'C']);
  });

  it('writes an empty question list for a set without questions, once', () => {
    const first = normalizeQuestionSet({ _id: SET_ID, survey_id: 'svy_1' });
    expect(first.document.questions).toEqual([]);
    expect(first.needsWrite).toBe(true);

    const second = normalizeQuestionSet(stored(first.document));
    expect(second.needsWrite).toBe(false);
  });

  it('moves a question list stored under a legacy key', () => {
    const legacy = {
      _id: SET_ID,
      survey_id: 'svy_1',
      qs: [{ question_id: QUESTION_ID, text: 'Color', options: [{ option_id: OPTION_ID, label: 'Red' }] }],
    };
    const first = normalizeQuestionSet(legacy);

    expect(first.needsWrite).toBe(true);
    expect(first.document.questions).toEqual([
      {
        question_id: QUESTION_ID,
        question_text: 'Color',
        question_type: 'mcq',
        options: [{ option_id: OPTION_ID, label: 'Red', value: 'Red' }],
        required: false,
        order: 1,
        metadata: {},
      },
    ]);
    // A targeted write leaves the old `qs` list in place
    expect(normalizeQuestionSet(stored({ ...first.document, qs: legacy.qs })).needsWrite).toBe(false);
  });

  it('rewrites canonical ids stored under camelCase keys', () => {
    const { document, needsWrite } = normalizeQuestionSet({
      _id: SET_ID,
      survey_id: 'svy_1',
      questions: [
        {
          questionId: QUESTION_ID,
          text: 'Color',
          type: 'radio',
          options: [{ optionId: OPTION_ID, label: 'Red' }],
        },
      ],
    });

    expect(needsWrite).toBe(true);
    expect(document.questions[0].question_id).toBe(QUESTION_ID);
    expect(document.questions[0].question_type).toBe('mcq');
    expect(document.questions[0].options[0].option_id).toBe(OPTION_ID);
  });

  it('rewrites a set whose questions lack canonical fields', () => {
    const { needsWrite } = normalizeQuestionSet({
      _id: SET_ID,
      survey_id: 'svy_1',
      questions: [{ question_id: QUESTION_ID, question_text: 'Name?', question_type: 'text', options: [] }],
    });

    expect(needsWrite).toBe(true);
  });
});
