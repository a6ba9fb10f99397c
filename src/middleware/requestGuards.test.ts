import { describe, expect, it, jest } from '@jest/globals';
import { requireGuidParam, requireJsonBody } from './requestGuards';
import { createRequest, createResponse } from '../controllers/__fixtures__/http';

const SURVEY_ID = '3f2b8c1e-9d4a-4e6b-8a1f-2c3d4e5f6a7b';

describe('requireJsonBody', () => {
  it('passes a request with a body', () => {
    const next = jest.fn();
    const { res, sent } = createResponse();

    requireJsonBody(createRequest({ body: { title: 'Water access' } }), res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(sent).toEqual({});
  });

  it.each([undefined, {}, ['title']])('answers 400 for body %p', (body) => {
    const next = jest.fn();
    const { res, sent } = createResponse();

    requireJsonBody(createRequest({ body }), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(sent).toEqual({ status: 400, body: { success: false, message: 'Missing JSON body' } });
  });
});

describe('requireGuidParam', () => {
  const guard = requireGuidParam('surveyId', 'survey_id');

  it('passes a GUID', () => {
    const next = jest.fn();
    const { res } = createResponse();

    guard(createRequest({ params: { surveyId: SURVEY_ID } }), res, next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it('names the parameter when it is not a GUID', () => {
    const next = jest.fn();
    const { res, sent } = createResponse();

    guard(createRequest({ params: { surveyId: 'svy_1' } }), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(sent).toEqual({
      status: 400,
      body: { success: false, message: 'Invalid survey_id (GUID expected).' },
    });
  });
});
