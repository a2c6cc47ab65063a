import { z } from 'zod';

const errorBodySchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      code: z.union([z.string(), z.number()]).nullish(),
    })
    .optional(),
});

/**
 * Error raised when Knox answers with a non-2xx status.
 * Carries the `{ error: { message, code } }` body and the HTTP status.
 */
export class KnoxClientError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: string | null,
  ) {
    super(message);
    this.name = 'KnoxClientError';

    Object.setPrototypeOf(this, KnoxClientError.prototype);
  }

  static async fromResponse(response: Response): Promise<KnoxClientError> {
    const text = await response.text();
    const parsed = errorBodySchema.safeParse(parseJson(text));
    const error = parsed.success ? parsed.data.error : undefined;
    const code = error?.code;

    return new KnoxClientError(
      error?.message ?? 'unknown',
      response.status,
      code === undefined || code === null ? null : String(code),
    );
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Non-JSON error bodies (gateway pages, empty bodies) carry no details
    return undefined;
  }
}
