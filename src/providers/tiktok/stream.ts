/**
 * Streaming reads of single lists out of a large TikTok JSON export.
 */
import { Readable } from "node:stream";
import Parser from "stream-json/Parser.js";
import Pick from "stream-json/filters/Pick.js";
import StreamArray from "stream-json/streamers/StreamArray.js";

/**
 * Items of the first array stored under the key `listKey`, wherever it is
 * nested. Resolves to [] when the key does not occur.
 */
export function streamList(data: Uint8Array, listKey: string): Promise<unknown[]> {
  return new Promise<unknown[]>((resolve, reject) => {
    const items: unknown[] = [];
    let rejected = false;
    const onError = (err: Error) => {
      if (!rejected) {
        rejected = true;
        reject(err);
      }
    };

    const nodeStream = Readable.from(Buffer.from(data));
    const jsonParser = new Parser();
    const picker = new Pick({
      filter: (stack) => stack.length > 0 && stack[stack.length - 1] === listKey,
      once: true,
    });
    const arrayStream = new StreamArray();

    nodeStream.on("error", onError);
    jsonParser.on("error", onError);
    picker.on("error", onError);
    arrayStream.on("error", onError);

    const pipeline = nodeStream.pipe(jsonParser).pipe(picker).pipe(arrayStream);

    pipeline.on("data", ({ value }: { value: unknown }) => {
      items.push(value);
    });

    pipeline.on("end", () => {
      if (!rejected) resolve(items);
    });
  });
}
