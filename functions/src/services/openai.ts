import axios, { AxiosInstance } from 'axios';
import * as functions from 'firebase-functions';
import { openAIConfig } from '../config';
import type { ClinicalRecord } from '../types/clinicalRecord';
import {
  CLINICAL_RECORD_RESPONSE_FORMAT,
  MODIFY_RECORD_TOOL,
  MODIFY_RECORD_TOOL_NAME,
  SYNTHESIS_SYSTEM_PROMPT,
  SYNTHESIS_USER_PROMPT,
  buildRecordSummaryPrompt,
} from './openai/clinicalPromptRegistry';

const BASE_URL = 'https://api.openai.com/v1';

export interface DocumentImage {
  mimeType: string;
  /** Base64-encoded image bytes */
  data: string;
}

export interface ChatTurnMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatReply {
  text: string;
  /** Raw JSON arguments of a modify_record tool call, if the model made one */
  toolCallArguments: string | null;
}

/**
 * The external model as the rest of the service sees it.
 */
export interface ClinicalModel {
  synthesizeRecord(images: DocumentImage[]): Promise<string>;
  chat(params: { systemInstruction: string; messages: ChatTurnMessage[] }): Promise<ChatReply>;
  summarizeRecord(record: ClinicalRecord): Promise<string>;
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
      tool_calls?: Array<{
        type?: string;
        function?: { name?: string; arguments?: string };
      }>;
    };
  }>;
}

export class ClinicalModelService implements ClinicalModel {
  private client: AxiosInstance;
  private model: string;

  constructor(apiKey: string, model: string, timeoutMs = 60000) {
    if (!apiKey) {
      throw new Error('OpenAI API key is not configured');
    }

    this.model = model || 'gpt-4o-mini';

    this.client = axios.create({
      baseURL: BASE_URL,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      timeout: timeoutMs,
    });
  }

  /**
   * OCR and standardize a set of document images. Returns the model's JSON
   * text as-is; callers validate it.
   */
  async synthesizeRecord(images: DocumentImage[]): Promise<string> {
    if (images.length === 0) {
      throw new Error('At least one document image is required for synthesis');
    }

    const response = await this.client.post<ChatCompletionResponse>('/chat/completions', {
      model: this.model,
      store: false, // HIPAA: Zero data retention
      temperature: 0.1,
      response_format: CLINICAL_RECORD_RESPONSE_FORMAT,
      messages: [
        { role: 'system', content: SYNTHESIS_SYSTEM_PROMPT },
        {
          role: 'user',
          content: [
            ...images.map((image) => ({
              type: 'image_url',
              image_url: { url: `data:${image.mimeType};base64,${image.data}` },
            })),
            { type: 'text', text: SYNTHESIS_USER_PROMPT },
          ],
        },
      ],
    });

    const content = response.data?.choices?.[0]?.message?.content?.trim() ?? '';
    functions.logger.info(
      `[OpenAI] Synthesis returned ${content.length} characters for ${images.length} images`,
    );
    return content;
  }

  async chat(params: {
    systemInstruction: string;
    messages: ChatTurnMessage[];
  }): Promise<ChatReply> {
    const response = await this.client.post<ChatCompletionResponse>('/chat/completions', {
      model: this.model,
      store: false,
      temperature: 0.3,
      tools: [MODIFY_RECORD_TOOL],
      messages: [
        { role: 'system', content: params.systemInstruction },
        ...params.messages.map((message) => ({ role: message.role, content: message.content })),
      ],
    });

    const message = response.data?.choices?.[0]?.message;
    const toolCall = message?.tool_calls?.find(
      (call) => call.function?.name === MODIFY_RECORD_TOOL_NAME,
    );

    return {
      text: message?.content?.trim() ?? '',
      toolCallArguments: toolCall?.function?.arguments ?? null,
    };
  }

  async summarizeRecord(record: ClinicalRecord): Promise<string> {
    const response = await this.client.post<ChatCompletionResponse>('/chat/completions', {
      model: this.model,
      store: false,
      temperature: 0.2,
      messages: [
        {
          role: 'user',
          content: buildRecordSummaryPrompt(JSON.stringify(record, null, 2)),
        },
      ],
    });

    return response.data?.choices?.[0]?.message?.content?.trim() ?? '';
  }
}

let clinicalModelServiceInstance: ClinicalModelService | null = null;

export const getClinicalModelService = (): ClinicalModelService => {
  if (!clinicalModelServiceInstance) {
    clinicalModelServiceInstance = new ClinicalModelService(
      openAIConfig.apiKey,
      openAIConfig.model,
      openAIConfig.timeoutMs,
    );
  }

  return clinicalModelServiceInstance;
};
