import { ValidationError } from './errors';

const DANGEROUS_FILENAME_PATTERNS = ['..', '/', '\\', ':', '*', '?', '"', '<', '>', '|'];

export const QUESTION_MIN_LENGTH = 3;
export const QUESTION_MAX_LENGTH = 500;

const INAPPROPRIATE_QUESTION_PATTERNS = [
  /\b(hack|crack|exploit|bypass)\b/i,
  /\b(password|credential|secret)\b/i,
  /\b(admin|root|sudo)\b/i,
  /\b(delete|remove|drop)\s+(database|table|index)\b/i,
  /\b(script|javascript|eval)\b/i
];
const QUESTION_STRIPPED_CHARS = /[<>"'&;]/g;

/** Strips markup and statement characters, then collapses whitespace. */
export function sanitizeText(text: string): string {
  return text.replace(QUESTION_STRIPPED_CHARS, '').split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Rejects empty, out-of-bounds and inappropriate questions. Returns the sanitized question.
 */
export function validateQuestion(question: unknown): string {
  if (typeof question !== 'string' || question.trim().length === 0) {
    throw new ValidationError('Question cannot be empty');
  }

  const normalized = sanitizeText(question);
  if (normalized.length < QUESTION_MIN_LENGTH) {
    throw new ValidationError(`Question must be at least ${QUESTION_MIN_LENGTH} characters long`);
  }
  if (normalized.length > QUESTION_MAX_LENGTH) {
    throw new ValidationError(`Question cannot exceed ${QUESTION_MAX_LENGTH} characters`);
  }
  if (INAPPROPRIATE_QUESTION_PATTERNS.some(pattern => pattern.test(normalized))) {
    throw new ValidationError('Question contains inappropriate content');
  }
  return normalized;
}

export const TOPIC_MAX_LENGTH = 100;

/** Optional topic for suggested questions; blank means none. */
export function validateSuggestionTopic(topic: unknown): string | undefined {
  if (topic === undefined || topic === null) {
    return undefined;
  }
  if (typeof topic !== 'string') {
    throw new ValidationError('Topic must be a string');
  }
  const normalized = sanitizeText(topic);
  if (normalized.length > TOPIC_MAX_LENGTH) {
    throw new ValidationError(`Topic cannot exceed ${TOPIC_MAX_LENGTH} characters`);
  }
  return normalized || undefined;
}

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot >= 0 ? filename.slice(dot + 1).toLowerCase() : '';
}

export interface FileValidationOptions {
  maxFileSize: number;
  allowedFormats: string[];
}

export class FileValidator {
  private maxFileSize: number;
  private allowedFormats: Set<string>;

  constructor(options: FileValidationOptions) {
    this.maxFileSize = options.maxFileSize;
    this.allowedFormats = new Set(options.allowedFormats.map(format => format.toLowerCase()));
  }

  /**
   * Checks an upload before any indexing work and returns its resolved format.
   * All problems are reported together in `details`.
   */
  validateUpload(filename: string, sizeBytes: number, declaredFormat?: string): string {
    const errors: string[] = [];
    const format = (declaredFormat || fileExtension(filename)).toLowerCase();

    if (!filename.trim()) {
      errors.push('Filename is required');
    } else if (DANGEROUS_FILENAME_PATTERNS.some(pattern => filename.includes(pattern))) {
      errors.push('Filename contains potentially dangerous characters');
    }

    if (sizeBytes === 0) {
      errors.push('File is empty');
    } else if (sizeBytes > this.maxFileSize) {
      errors.push(`File size (${sizeBytes} bytes) exceeds maximum allowed size of ${this.maxFileSize} bytes`);
    }

    if (!this.allowedFormats.has(format)) {
      errors.push(`File type '${format || 'unknown'}' is not allowed`);
    }

    if (errors.length > 0) {
      throw new ValidationError('File validation failed', errors);
    }
    return format;
  }
}

/**
 * Normalizes access tags: trimmed, lower-cased, de-duplicated and sorted.
 */
export function normalizeTags(tags: unknown): string[] {
  if (tags === undefined || tags === null) {
    return [];
  }
  const values = typeof tags === 'string' ? tags.split(',') : tags;
  if (!Array.isArray(values) || values.some(tag => typeof tag !== 'string')) {
    throw new ValidationError('Access tags must be a list of strings');
  }

  const normalized = new Set<string>();
  for (const tag of values) {
    const value = String(tag).trim().toLowerCase();
    if (value) {
      normalized.add(value);
    }
  }
  return [...normalized].sort();
}
