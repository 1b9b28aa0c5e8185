import { describe, expect, it } from 'vitest';
import { DocumentParseError } from '../../services/documentIntake.service';
import { createErrorResponse, masterDataErrorMap, poReviewErrorMap, settingsErrorMap } from './errors';

describe('createErrorResponse', () => {
  it('omits details unless given', () => {
    expect(createErrorResponse(404, 'Not found')).toEqual({ status: 404, body: { error: 'Not found' } });
    expect(createErrorResponse(400, 'Bad', { field: 'sku' })).toEqual({
      status: 400,
      body: { error: 'Bad', details: { field: 'sku' } }
    });
  });
});

describe('error maps', () => {
  it('answers parse failures with the parser message', () => {
    const error = new DocumentParseError('bad.csv has no SKU column.', 'bad.csv');
    expect(poReviewErrorMap[error.message](error)).toEqual({
      status: 422,
      body: { error: 'bad.csv has no SKU column.', details: { document: 'bad.csv' } }
    });
    expect(poReviewErrorMap.DOCUMENT_PARSE_FAILED(new Error('DOCUMENT_PARSE_FAILED')).status).toBe(422);
  });

  it('maps lookup and persistence codes to their statuses', () => {
    expect(poReviewErrorMap.REVIEW_NOT_FOUND(new Error('REVIEW_NOT_FOUND')).status).toBe(404);
    expect(masterDataErrorMap.SKU_NOT_FOUND(new Error('SKU_NOT_FOUND')).status).toBe(404);
    expect(masterDataErrorMap.MASTER_DATA_RELOAD_FAILED(new Error('MASTER_DATA_RELOAD_FAILED')).status).toBe(503);
    expect(settingsErrorMap.SETTINGS_SAVE_FAILED(new Error('SETTINGS_SAVE_FAILED')).status).toBe(500);
  });
});
