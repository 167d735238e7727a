// packages/core/src/graph/global-codec.ts — Opaque blob for handing GlobalDefaults to child workflows

import { deflateSync, inflateSync } from 'node:zlib';
import { z } from 'zod';
import { ErrorCode } from '../types/errors.js';
import type { GlobalDefaults } from '../types/workflow.js';
import { WorkflowError } from '../utils/errors.js';

const payloadSchema = z.object({
  jobTracker: z.string().optional(),
  nameNode: z.string().optional(),
  jobXmls: z.array(z.string()),
  configuration: z.array(z.tuple([z.string(), z.string()])).optional(),
});

type GlobalDefaultsPayload = z.infer<typeof payloadSchema>;

export function encodeGlobalDefaults(globals: GlobalDefaults): string {
  const payload: GlobalDefaultsPayload = {
    jobTracker: globals.jobTracker,
    nameNode: globals.nameNode,
    jobXmls: [...globals.jobXmls],
    configuration: globals.configuration ? [...globals.configuration.entries()] : undefined,
  };
  return deflateSync(Buffer.from(JSON.stringify(payload), 'utf-8')).toString('base64');
}

export function decodeGlobalDefaults(blob: string): GlobalDefaults {
  let payload: GlobalDefaultsPayload;
  try {
    const json = inflateSync(Buffer.from(blob, 'base64')).toString('utf-8');
    payload = payloadSchema.parse(JSON.parse(json));
  } catch {
    throw new WorkflowError(ErrorCode.MARKUP_PARSE_FAILURE, 'Error while processing global section conf');
  }
  return {
    jobTracker: payload.jobTracker,
    nameNode: payload.nameNode,
    jobXmls: payload.jobXmls,
    configuration: payload.configuration ? new Map(payload.configuration) : undefined,
  };
}
