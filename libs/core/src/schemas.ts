import { z } from "zod";

export const HttpMethodSchema = z
  .string()
  .trim()
  .min(1, "HTTP method is required")
  .transform((method) => method.toUpperCase())
  .pipe(z.string().regex(/^[A-Z]+$/, "HTTP method must contain letters only"));

export const HeaderEntrySchema = z.tuple([z.string().min(1), z.string()]);

export const HeaderListSchema = z
  .union([z.array(HeaderEntrySchema), z.record(z.string(), z.string())])
  .transform((headers): Array<[string, string]> =>
    Array.isArray(headers) ? headers.map(([key, value]) => [key, value]) : Object.entries(headers),
  );

export const TextEncodingSchema = z.enum(["utf8", "utf16le", "latin1", "ascii"]);

export const RequestCookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
});

export const TransportOptionsSchema = z.object({
  method: HttpMethodSchema,
  uri: z.string().trim().optional(),
  baseAddress: z.string().trim().optional(),
  headers: HeaderListSchema.default([]),
  cookies: z.array(RequestCookieSchema).default([]),
  encoding: TextEncodingSchema.default("utf8"),
});

export const ParsedHttpRequestSchema = z.object({
  title: z.string().min(1),
  method: HttpMethodSchema,
  url: z.string().min(1),
  headers: z.array(HeaderEntrySchema).default([]),
  body: z.string().optional(),
});

export const ResolvedHttpRequestSchema = ParsedHttpRequestSchema.extend({
  missingVariables: z.array(z.string()).default([]),
});

export type HeaderEntry = z.infer<typeof HeaderEntrySchema>;
export type HeaderList = z.input<typeof HeaderListSchema>;
export type TextEncoding = z.infer<typeof TextEncodingSchema>;
export type RequestCookie = z.infer<typeof RequestCookieSchema>;
export type TransportOptionsInput = z.input<typeof TransportOptionsSchema>;
export type TransportOptions = z.output<typeof TransportOptionsSchema>;
export type ParsedHttpRequest = z.infer<typeof ParsedHttpRequestSchema>;
export type ResolvedHttpRequest = z.infer<typeof ResolvedHttpRequestSchema>;
