import type { Request } from "express"

export function reqLog(req: Request, ...args: unknown[]) {
  req.log(...args)
}
