/**
 * Validation of inbound generation requests.
 *
 * Requests arrive in the snake_case wire shape and leave as an immutable,
 * camelCase GenerationRequest. Optional fields that were not sent stay unset.
 */

import { z } from 'zod';
import {
  EXPORT_FORMATS,
  IMAGE_TYPES,
  MAX_SLIDES,
  MIN_SLIDES,
  TONES,
  VERBOSITY_LEVELS,
  type GenerationRequest,
} from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { describeUrlProblem } from '../../utils/url.js';

const oneOf = (label: string, values: readonly string[]): string => `${label} must be one of: ${values.join(', ')}`;

export const generationRequestSchema = z.object({
  github_url: z.string().superRefine((url, ctx) => {
    const problem = describeUrlProblem(url);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  }),
  n_slides: z
    .number()
    .int('Number of slides must be a whole number')
    .min(MIN_SLIDES, `Number of slides must be between ${MIN_SLIDES} and ${MAX_SLIDES}`)
    .max(MAX_SLIDES, `Number of slides must be between ${MIN_SLIDES} and ${MAX_SLIDES}`)
    .nullish(),
  tone: z.enum(TONES, { errorMap: () => ({ message: oneOf('Tone', TONES) }) }).nullish(),
  verbosity: z.enum(VERBOSITY_LEVELS, { errorMap: () => ({ message: oneOf('Verbosity', VERBOSITY_LEVELS) }) }).nullish(),
  language: z.string().min(1).nullish(),
  template: z.string().min(1).nullish(),
  export_as: z.enum(EXPORT_FORMATS, { errorMap: () => ({ message: "Export format must be 'pptx' or 'pdf'" }) }).nullish(),
  include_title_slide: z.boolean().nullish(),
  include_table_of_contents: z.boolean().nullish(),
  image_type: z.enum(IMAGE_TYPES, { errorMap: () => ({ message: oneOf('Image type', IMAGE_TYPES) }) }).nullish(),
  web_search: z.boolean().nullish(),
  theme: z.string().min(1).nullish(),
});

export type GenerationRequestInput = z.input<typeof generationRequestSchema>;

export type ValidationResult =
  | { ok: true; request: GenerationRequest }
  | { ok: false; issues: string[] };

/**
 * Check a wire request without throwing
 */
export function checkRequest(input: unknown): ValidationResult {
  const result = generationRequestSchema.safeParse(input);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`),
    };
  }

  const data = result.data;
  const request: GenerationRequest = {
    githubUrl: data.github_url.trim(),
    ...(data.n_slides != null ? { nSlides: data.n_slides } : {}),
    ...(data.tone != null ? { tone: data.tone } : {}),
    ...(data.verbosity != null ? { verbosity: data.verbosity } : {}),
    ...(data.language != null ? { language: data.language } : {}),
    ...(data.template != null ? { template: data.template } : {}),
    ...(data.export_as != null ? { exportAs: data.export_as } : {}),
    ...(data.include_title_slide != null ? { includeTitleSlide: data.include_title_slide } : {}),
    ...(data.include_table_of_contents != null ? { includeTableOfContents: data.include_table_of_contents } : {}),
    ...(data.image_type != null ? { imageType: data.image_type } : {}),
    ...(data.web_search != null ? { webSearch: data.web_search } : {}),
    ...(data.theme != null ? { theme: data.theme } : {}),
  };

  return { ok: true, request: Object.freeze(request) };
}

/**
 * Validate a wire request, throwing VALIDATION_ERROR with every issue found
 */
export function validateRequest(input: unknown): GenerationRequest {
  const result = checkRequest(input);
  if (!result.ok) {
    throw errors.validation(result.issues);
  }
  return result.request;
}
