import { describe, expect, it, jest, beforeEach } from '@jest/globals';
import { handleCreateCycle, handleDeleteCycle, handleGetAllCycles, handleUpdateCycle } from './cycleController';
import { createRequest, createResponse, lean, LeanQuery } from './__fixtures__/http';

const mockCreate = jest.fn<(doc: unknown) => Promise<unknown>>();
const mockFind = jest.fn<(filter: unknown) => LeanQuery>();
const mockFindOneAndUpdate = jest.fn<(filter: unknown, update: unknown, options: unknown) => LeanQuery>();
const mockDeleteOne = jest.fn<(filter: unknown) => Promise<{ deletedCount: number }>>();

jest.mock('../models/SurveyCycle', () => ({
  __esModule: true,
  default: {
    create: (doc: unknown) => mockCreate(doc),
    find: (filter: unknown) => mockFind(filter),
    findOneAndUpdate: (filter: unknown, update: unknown, options: unknown) =>
      mockFindOneAndUpdate(filter, update, options),
    deleteOne: (filter: unknown) => mockDeleteOne(filter),
  },
}));

describe('cycleController', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    mockFind.mockReset();
    mockFindOneAndUpdate.mockReset();
    mockDeleteOne.mockReset();
  });

  it('creates a cycle and returns it', async () => {
    mockCreate.mockResolvedValue({});
    const { res, sent } = createResponse();

    await handleCreateCycle(createRequest({ body: { survey_id: 'svy_1', start_date: '2025-01-01' } }), res);

    const cycle = { _id: expect.any(String), survey_id: 'svy_1', start_date: '2025-01-01', end_date: null };
    expect(mockCreate).toHaveBeenCalledWith(cycle);
    expect(sent).toEqual({
      status: 201,
      body: { success: true, message: 'Survey cycle created successfully.', data: cycle },
    });
  });

  it('requires a survey id', async () => {
    const { res, sent } = createResponse();

    await handleCreateCycle(createRequest({ body: { start_date: '2025-01-01' } }), res);

    expect(sent).toEqual({
      status: 400,
      body: {
        success: false,
        message: 'Validation failed',
        errors: [{ field: 'survey_id', message: 'survey_id is required.' }],
      },
    });
  });

  it('lists the cycles of one survey', async () => {
    mockFind.mockReturnValue(lean([]));
    const { res } = createResponse();

    await handleGetAllCycles(createRequest({ query: { survey_id: 'svy_1' } }), res);

    expect(mockFind).toHaveBeenCalledWith({ survey_id: 'svy_1' });
  });

  it('sets only the dates that were sent', async () => {
    const updated = { _id: 'cycle_1', survey_id: 'svy_1', start_date: '2025-01-01', end_date: '2025-03-31' };
    mockFindOneAndUpdate.mockReturnValue(lean(updated));
    const { res, sent } = createResponse();

    await handleUpdateCycle(createRequest({ params: { id: 'cycle_1' }, body: { end_date: '2025-03-31' } }), res);

    expect(mockFindOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'cycle_1' },
      { $set: { end_date: '2025-03-31' } },
      { new: true }
    );
    expect(sent).toEqual({
      status: 200,
      body: { success: true, message: 'Cycle updated successfully', data: updated },
    });
  });

  it('reports a missing cycle', async () => {
    mockFindOneAndUpdate.mockReturnValue(lean(null));
    mockDeleteOne.mockResolvedValue({ deletedCount: 0 });
    const updated = createResponse();
    const deleted = createResponse();

    await handleUpdateCycle(createRequest({ params: { id: 'cycle_x' }, body: { end_date: null } }), updated.res);
    await handleDeleteCycle(createRequest({ params: { id: 'cycle_x' } }), deleted.res);

    expect(updated.sent).toEqual({ status: 404, body: { success: false, message: 'Cycle not found' } });
    expect(deleted.sent).toEqual({ status: 404, body: { success: false, message: 'Cycle not found' } });
  });
});
