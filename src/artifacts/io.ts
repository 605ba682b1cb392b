import { createWriteStream, existsSync, readFileSync, renameSync, writeFileSync } from "node:fs";

export interface JsonlWriter {
  path: string;
  append: (record: unknown) => void;
  close: () => Promise<void>;
}

export const createJsonlWriter = (path: string): JsonlWriter => {
  const stream = createWriteStream(path, { flags: "a" });
  let streamError: Error | null = null;
  let closed = false;

  stream.on("error", (error) => {
    streamError = error;
  });

  return {
    path,
    append: (record: unknown) => {
      if (closed) {
        throw new Error(`JSONL writer is closed: ${path}`);
      }
      if (streamError) {
        throw streamError;
      }
      stream.write(`${JSON.stringify(record)}\n`);
    },
    close: () => {
      if (closed) {
        return Promise.resolve();
      }
      closed = true;
      if (streamError) {
        return Promise.reject(streamError);
      }
      return new Promise((resolve, reject) => {
        const onError = (error: Error): void => {
          streamError = error;
          cleanup();
          reject(error);
        };
        const onFinish = (): void => {
          cleanup();
          if (streamError) {
            reject(streamError);
            return;
          }
          resolve();
        };
        const cleanup = (): void => {
          stream.off("error", onError);
          stream.off("finish", onFinish);
        };

        stream.once("error", onError);
        stream.once("finish", onFinish);
        stream.end();
      });
    }
  };
};

export const writeTextAtomic = (path: string, text: string): void => {
  const tmpPath = `${path}.tmp`;
  writeFileSync(tmpPath, text, "utf8");
  renameSync(tmpPath, path);
};

export const writeJsonAtomic = (path: string, data: unknown): void => {
  writeTextAtomic(path, `${JSON.stringify(data, null, 2)}\n`);
};

export const readTextIfExists = (path: string): string | null =>
  existsSync(path) ? readFileSync(path, "utf8") : null;

export const readJsonFile = (path: string): unknown => JSON.parse(readFileSync(path, "utf8")) as unknown;
