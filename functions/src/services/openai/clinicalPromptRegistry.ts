export const SYNTHESIS_SYSTEM_PROMPT = [
  'You are a Clinical Data Synthesizer.',
  'Perform OCR on all uploaded clinical documents, then merge and standardize all problems',
  'and medications into one JSON summary.',
  '',
  'Rules:',
  '  • Code problems with SNOMED CT (standard_code_type "SNOMED_CT").',
  '  • Code medications with RxNorm (standard_code_type "RxNorm").',
  '  • date_of_service is the visit date as YYYY-MM-DD; use an empty string when it is not legible.',
  '  • quick_summary is one sentence covering the major problems and medications.',
  '  • List each problem and medication once.',
].join('\n');

export const SYNTHESIS_USER_PROMPT =
  'Extract all problems and medications and synthesize a unified JSON summary.';

const clinicalTermJsonSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['standard_name', 'standard_code_type', 'standard_code_value'],
  properties: {
    standard_name: { type: 'string' },
    standard_code_type: { type: 'string' },
    standard_code_value: { type: 'string' },
  },
} as const;

/** Response schema for the synthesis call (OpenAI strict structured output). */
export const CLINICAL_RECORD_RESPONSE_FORMAT = {
  type: 'json_schema',
  json_schema: {
    name: 'clinical_record',
    strict: true,
    schema: {
      type: 'object',
      additionalProperties: false,
      required: ['patient_id', 'date_of_service', 'quick_summary', 'problems', 'medications'],
      properties: {
        patient_id: { type: 'string' },
        date_of_service: { type: 'string' },
        quick_summary: { type: 'string' },
        problems: { type: 'array', items: clinicalTermJsonSchema },
        medications: { type: 'array', items: clinicalTermJsonSchema },
      },
    },
  },
} as const;

export const MODIFY_RECORD_TOOL_NAME = 'modify_record';

/** Function tool the chat model calls to request a record change. */
export const MODIFY_RECORD_TOOL = {
  type: 'function',
  function: {
    name: MODIFY_RECORD_TOOL_NAME,
    description:
      "Add, remove or update an entry in the patient's problems or medications, or replace the quick summary.",
    parameters: {
      type: 'object',
      additionalProperties: false,
      required: ['action', 'target', 'details'],
      properties: {
        action: { type: 'string', enum: ['add', 'remove', 'update'] },
        target: { type: 'string', enum: ['problems', 'medications', 'quick_summary'] },
        details: {
          type: 'object',
          description:
            'For problems and medications: standard_name, standard_code_type and standard_code_value. For quick_summary: { "text": string }.',
        },
      },
    },
  },
} as const;

export function buildChatSystemPrompt(patientName: string, recordContext: string): string {
  return [
    "You are a Clinical Data Assistant. You answer questions about the patient's record and can modify it.",
    'You may recommend additions, removals or updates to problems and medications based on',
    'established clinical practice, including dosage information.',
    `The patient's name is ${patientName}.`,
    `To modify the record call the ${MODIFY_RECORD_TOOL_NAME} tool. If tools are unavailable, include a JSON block`,
    'with `action`, `target` and `details` keys in your reply, for example:',
    '{"action": "add", "target": "medications", "details": {"standard_name": "Lisinopril", ' +
      '"standard_code_type": "RxNorm", "standard_code_value": "29046"}}',
    '--- PATIENT RECORD ---',
    recordContext,
  ].join('\n');
}

export function buildRecordSummaryPrompt(recordJson: string): string {
  return [
    "Summarize this patient's current clinical record in one concise sentence.",
    'Mention their major problems and medications.',
    '',
    `RECORD:\n${recordJson}`,
  ].join('\n');
}
