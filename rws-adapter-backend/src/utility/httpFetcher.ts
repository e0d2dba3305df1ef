import * as http from "http";
import * as https from "https";
import logger from "./logger";
import { ControllerRequestError } from "../dataset/errors";

/** Source of raw controller responses, one resource path at a time. */
export interface ResourceFetcher {
  fetch(path: string, signal: AbortSignal): Promise<string>;
}

export interface HttpFetcherOptions {
  baseUrl: string;
  username?: string;
  password?: string;
}

export class HttpResourceFetcher implements ResourceFetcher {
  private readonly baseUrl: URL;
  private readonly basePath: string;
  private readonly headers: { [key: string]: string };

  constructor(options: HttpFetcherOptions) {
    this.baseUrl = new URL(options.baseUrl);
    // resource paths are absolute; keep any prefix such as "/rws"
    this.basePath = this.baseUrl.pathname.replace(/\/+$/, "");
    this.headers = {
      "User-Agent": "rws-adapter",
      Accept: "application/xhtml+xml",
    };
    if (options.username) {
      const credentials = Buffer.from(
        `${options.username}:${options.password ?? ""}`
      ).toString("base64");
      this.headers["Authorization"] = `Basic ${credentials}`;
    }
  }

  public fetch(path: string, signal: AbortSignal): Promise<string> {
    const url = new URL(`${this.basePath}${path}`, this.baseUrl);
    const options: http.RequestOptions = { headers: this.headers, signal };

    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        const statusCode = res.statusCode ?? 0;
        if (statusCode < 200 || statusCode >= 300) {
          res.resume();
          reject(new ControllerRequestError(path, statusCode));
          return;
        }

        let data = "";
        res.setEncoding("utf8");
        res.on("data", (chunk: string) => {
          data += chunk;
        });
        res.on("end", () => {
          logger.debug(`Fetched ${path} (${data.length} chars)`);
          resolve(data);
        });
        res.on("error", (error) =>
          reject(new ControllerRequestError(path, undefined, error))
        );
      };

      const req =
        url.protocol === "https:"
          ? https.get(url, options, onResponse)
          : http.get(url, options, onResponse);
      req.on("error", (error) =>
        reject(new ControllerRequestError(path, undefined, error))
      );
    });
  }
}
