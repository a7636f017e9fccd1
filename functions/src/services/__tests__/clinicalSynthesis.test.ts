import { HYPERTENSION, LISINOPRIL, createModelMock, makeRecord } from '../../__tests__/fixtures';
import {
  SynthesisError,
  buildNoteFromRecord,
  parseSynthesisResult,
  synthesizeNote,
} from '../clinicalSynthesis';

const IMAGES = [{ mimeType: 'image/png', data: 'cGFnZTE=' }];

function captureSynthesisError(fn: () => unknown): SynthesisError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SynthesisError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a SynthesisError');
}

describe('parseSynthesisResult', () => {
  it('parses a complete record', () => {
    const record = makeRecord({ problems: [HYPERTENSION], medications: [LISINOPRIL] });

    expect(parseSynthesisResult(JSON.stringify(record))).toEqual(record);
  });

  it('fills missing fields with empty defaults', () => {
    expect(parseSynthesisResult('{"quick_summary": "Stable."}')).toEqual({
      patient_id: '',
      date_of_service: '',
      quick_summary: 'Stable.',
      problems: [],
      medications: [],
    });
  });

  it('reads JSON wrapped in a code fence', () => {
    const content = '```json\n{"patient_id": "MRN-77", "problems": []}\n```';

    expect(parseSynthesisResult(content).patient_id).toBe('MRN-77');
  });

  it('rejects an empty response', () => {
    expect(captureSynthesisError(() => parseSynthesisResult('  ')).code).toBe('empty_response');
  });

  it('rejects content that is not JSON', () => {
    const error = captureSynthesisError(() => parseSynthesisResult('I could not read the page.'));

    expect(error.code).toBe('invalid_json');
    expect(error.message).toMatch(/^The model returned invalid JSON: /);
  });

  it('names the fields that do not match the schema', () => {
    const error = captureSynthesisError(() =>
      parseSynthesisResult('{"problems": "none", "quick_summary": 3}'),
    );

    expect(error.code).toBe('schema_mismatch');
    expect(error.message).toBe(
      'The synthesis did not match the record schema (quick_summary, problems)',
    );
  });

  it('rejects terms missing a code', () => {
    const error = captureSynthesisError(() =>
      parseSynthesisResult('{"medications": [{"standard_name": "Lisinopril"}]}'),
    );

    expect(error.code).toBe('schema_mismatch');
  });
});

describe('buildNoteFromRecord', () => {
  it('copies the service date and summary from the record', () => {
    const record = makeRecord();

    expect(buildNoteFromRecord(record)).toEqual({
      date_of_service: '2025-10-20',
      summary: 'Hypertension managed without medication.',
      raw_data: record,
    });
  });

  it('falls back to today and N/A', () => {
    const record = makeRecord({ date_of_service: '', quick_summary: '' });

    const note = buildNoteFromRecord(record, new Date('2026-03-09T23:30:00.000Z'));

    expect(note.date_of_service).toBe('2026-03-09');
    expect(note.summary).toBe('N/A');
  });
});

describe('synthesizeNote', () => {
  it('builds a note from the model output', async () => {
    const model = createModelMock();
    const record = makeRecord({ medications: [LISINOPRIL] });
    model.synthesizeRecord.mockResolvedValue(JSON.stringify(record));

    const note = await synthesizeNote(model, IMAGES);

    expect(model.synthesizeRecord).toHaveBeenCalledWith(IMAGES);
    expect(note.raw_data).toEqual(record);
    expect(note.summary).toBe(record.quick_summary);
  });

  it('wraps model failures', async () => {
    const model = createModelMock();
    model.synthesizeRecord.mockRejectedValue(new Error('Request failed with status code 500'));

    await expect(synthesizeNote(model, IMAGES)).rejects.toMatchObject({
      name: 'SynthesisError',
      code: 'model_error',
      message: 'Error during synthesis: Request failed with status code 500',
    });
  });

  it('fails on malformed output', async () => {
    const model = createModelMock();
    model.synthesizeRecord.mockResolvedValue('{"quick_summary": ');

    await expect(synthesizeNote(model, IMAGES)).rejects.toMatchObject({ code: 'invalid_json' });
  });
});
