import { z } from "zod";

/**
 * Decoders for Honeybadger API v2 responses. Unknown keys are stripped and
 * optional fields get defaults, so callers only ever see these shapes.
 */

const idSchema = z.union([z.number(), z.string()]);

export const faultSchema = z.object({
  id: idSchema,
  project_id: z.number().optional(),
  klass: z.string(),
  message: z.string().nullable().default(null),
  component: z.string().nullable().default(null),
  action: z.string().nullable().default(null),
  environment: z.string().nullable().default(null),
  resolved: z.boolean().default(false),
  ignored: z.boolean().default(false),
  created_at: z.string().optional(),
  last_notice_at: z.string().nullable().default(null),
  notices_count: z.number().default(0),
  comments_count: z.number().default(0),
  url: z.string().optional(),
  tags: z.array(z.string()).default([]),
  assignee: z
    .object({ id: z.number(), email: z.string().optional(), name: z.string().optional() })
    .nullable()
    .default(null),
});

export type Fault = z.infer<typeof faultSchema>;

export const backtraceFrameSchema = z.object({
  number: z.union([z.string(), z.number()]).optional(),
  file: z.string().nullable().default(null),
  method: z.string().nullable().default(null),
});

export const noticeSchema = z.object({
  id: z.string(),
  fault_id: idSchema.optional(),
  created_at: z.string(),
  message: z.string().nullable().default(null),
  url: z.string().optional(),
  environment_name: z.string().nullable().default(null),
  environment: z.record(z.unknown()).default({}),
  request: z.record(z.unknown()).default({}),
  web_environment: z.record(z.unknown()).default({}),
  backtrace: z.array(backtraceFrameSchema).default([]),
});

export type Notice = z.infer<typeof noticeSchema>;

/** List endpoints wrap their records in `{ results, links }` */
export function resultsPageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    results: z.array(item),
  });
}

export const faultsPageSchema = resultsPageSchema(faultSchema);
export const noticesPageSchema = resultsPageSchema(noticeSchema);

export interface FaultDetails {
  fault: Fault;
  notices: Notice[];
}
