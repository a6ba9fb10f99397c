import { describe, expect, it } from '@jest/globals';
import { mapIndexesToIds, rateAnswers, SubmittedAnswer } from './responseService';

const questions = [
  {
    qno: 1,
    text: 'Color?',
    options: [
      { option_id: 1, option: 'Red', rating: 4 },
      { option_id: 2, option: 'Blue', rating: 2 },
    ],
  },
  { question_id: 'q-city', options: [{ option_id: 'o-pune' }] },
  { text: 'No id' },
];

const answer = (fields: Partial<SubmittedAnswer>): SubmittedAnswer => ({
  question_id: null,
  question_type: null,
  option_id: null,
  value: null,
  value_text: null,
  value_number: null,
  ...fields,
});

describe('mapIndexesToIds', () => {
  it('resolves positions to the stored qno and option id', () => {
    const { answers, errors } = mapIndexesToIds(questions, [{ questionIndex: 0, optionIndex: 1 }]);

    expect(errors).toEqual([]);
    expect(answers).toEqual([{ questionIndex: 0, optionIndex: 1, questionId: 1, optionId: 2 }]);
  });

  it('falls back to question_id for questions without a qno', () => {
    const { answers } = mapIndexesToIds(questions, [{ question_index: 1, option_index: 0 }]);

    expect(answers).toEqual([
      { question_index: 1, option_index: 0, questionId: 'q-city', optionId: 'o-pune' },
    ]);
  });

  it('finds the question by id when only an option index is given', () => {
    const { answers } = mapIndexesToIds(questions, [{ questionId: 1, optionIndex: 0 }]);

    expect(answers).toEqual([{ questionId: 1, optionIndex: 0, optionId: 1 }]);
  });

  it('reports every index it cannot resolve', () => {
    const { errors } = mapIndexesToIds(questions, [
      { questionIndex: 5 },
      { questionIndex: 2 },
      { questionIndex: 0, optionIndex: 9 },
      { optionIndex: 0 },
      { questionIndex: 0, optionIndex: 'first' },
    ]);

    expect(errors).toEqual([
      { field: 'answers.0', message: 'invalid questionIndex' },
      { field: 'answers.1', message: 'cannot resolve question id for index' },
      { field: 'answers.2', message: 'optionIndex out of range' },
      { field: 'answers.3', message: 'cannot resolve optionIndex without question present' },
      { field: 'answers.4', message: 'invalid optionIndex' },
    ]);
  });
});

describe('rateAnswers', () => {
  it('copies option ratings and averages the positive ones', () => {
    const { answers, rating } = rateAnswers(questions, [
      answer({ question_id: 1, option_id: 1 }),
      answer({ question_id: 1, option_id: 2 }),
      answer({ question_id: 'q-city', option_id: 'o-pune' }),
      answer({ question_id: 1, value: 'skipped' }),
    ]);

    expect(answers.map((rated) => rated.rating)).toEqual([4, 2, 0, undefined]);
    expect(rating).toBe(3);
  });

  it('has no overall rating without rated options', () => {
    expect(rateAnswers(questions, [answer({ question_id: 9, option_id: 1 })]).rating).toBeNull();
  });
});
