import { NextFunction, Request, Response } from 'express';

// Free text typed into the form or returned by the provider never reaches the logs.
const REDACT_KEYS = ['answers', 'cc', 'oa', 'description', 'text', 'advisoryText', 'projectName', 'sponsorName', 'assessmentOwner'];

type LogMeta = Record<string, unknown>;

function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value && typeof value === 'object') {
    const copy: LogMeta = {};
    for (const [k, v] of Object.entries(value)) {
      copy[k] = REDACT_KEYS.includes(k) ? '[REDACTED]' : redact(v);
    }
    return copy;
  }
  return value;
}

export const safeLogger = {
  info(event: string, meta: LogMeta = {}) {
    // eslint-disable-next-line no-console
    console.info(event, redact(meta));
  },
  error(event: string, meta: LogMeta = {}) {
    // eslint-disable-next-line no-console
    console.error(event, redact(meta));
  },
};

export const preventBodyLogging = (req: Request, _res: Response, next: NextFunction) => {
  Object.defineProperty(req, 'body', {
    configurable: true,
    enumerable: false,
    writable: false,
    value: req.body,
  });
  next();
};
