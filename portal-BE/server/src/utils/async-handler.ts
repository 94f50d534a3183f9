import type { NextFunction, Request, RequestHandler, Response } from 'express'

type MaybeAsyncHandler = (req: Request, res: Response, next: NextFunction) => unknown

/**
 * Forwards sync throws and rejected promises to the Express error chain.
 */
export function asyncHandler(handler: MaybeAsyncHandler): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res, next))
      .catch(next)
  }
}
