import { z } from 'zod';

const utteranceSchema = z
  .object({
    text: z.string().optional(),
    start_time: z.number().optional(),
    end_time: z.number().optional(),
    definite: z.boolean().optional(),
  })
  .passthrough();

const resultSchema = z
  .object({
    text: z.string().optional(),
    utterances: z.array(utteranceSchema).optional(),
  })
  .passthrough();

/** Body of a full server response. Unknown fields are kept; the service adds them freely. */
export const responseBodySchema = z
  .object({
    code: z.number().int().optional(),
    message: z.string().optional(),
    // Older revisions of the service wrap the result in a one-element array.
    result: z.union([resultSchema, z.array(resultSchema)]).optional(),
    audio_info: z
      .object({
        duration: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ResponseBody = z.infer<typeof responseBodySchema>;
export type ResponseResult = z.infer<typeof resultSchema>;

export const errorBodySchema = z
  .object({
    error: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();
