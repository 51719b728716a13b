import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';

export interface LanguageModel {
  readonly modelName: string;
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

export class GeminiLanguageModel implements LanguageModel {
  readonly modelName: string;
  private model: GenerativeModel;

  constructor(apiKey: string, modelName: string, temperature: number = 0.1) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = modelName;
    this.model = genAI.getGenerativeModel({
      model: modelName,
      generationConfig: {
        temperature // Low temperature for consistent, grounded answers
      }
    });
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const result = await this.model.generateContent(prompt, { signal });
    return result.response.text();
  }
}
