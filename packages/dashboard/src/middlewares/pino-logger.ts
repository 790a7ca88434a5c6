import { pinoLogger as logger } from "hono-pino";
import { getRootLogger } from "@deskwatch/utils/logger";

export interface PinoLoggerOptions {
  env: string;
  disableReqRes: boolean;
}

interface SerializedRequest {
  method: string;
  url: string;
  headers: unknown;
}

interface SerializedResponse {
  status: number;
  headers: unknown;
}

export function pinoLogger(options: PinoLoggerOptions) {
  const production = options.env === "production";
  return logger({
    pino: getRootLogger().child({ module: "http" }, {
      serializers: {
        res: (res: SerializedResponse) => {
          if (options.disableReqRes) {
            return undefined;
          }
          return {
            status: res.status,
            headers: JSON.stringify(res.headers),
          };
        },
        req: (req: SerializedRequest) => {
          if (options.disableReqRes) {
            return undefined;
          }
          return {
            method: req.method,
            url: req.url,
            headers: production ? req.headers : JSON.stringify(req.headers),
          };
        },
      },
    }),
    http: {
      reqId: () => crypto.randomUUID(),
    },
  });
}
