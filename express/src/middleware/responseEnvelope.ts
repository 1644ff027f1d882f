import type { NextFunction, Request, Response } from 'express';

export type OkOptions = {
  code?: number;
};

export type FailPayload = {
  code: number;
  message: string;
  errors?: Record<string, unknown>;
};

declare global {
  namespace Express {
    interface Response {
      ok: (data: unknown, opts?: OkOptions) => Response;
      fail: (payload: FailPayload) => Response;
    }
  }
}

export function responseEnvelope(req: Request, res: Response, next: NextFunction) {
  void req;

  res.ok = (data: unknown, opts?: OkOptions) => {
    const code = opts?.code ?? 200;
    return res.status(code).json({
      success: true,
      code,
      data,
    });
  };

  res.fail = (payload: FailPayload) => {
    const code = payload.code;
    return res.status(code).json({
      success: false,
      code,
      message: payload.message,
      errors: payload.errors ?? { root: payload.message },
    });
  };

  next();
}
