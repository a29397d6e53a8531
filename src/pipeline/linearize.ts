import * as sax from "sax";
import { StringDecoder } from "string_decoder";
import { RecipeCardError } from "../lib/errors";

const CHUNK_SIZE = 64 * 1024;

function localName(qualifiedName: string): string {
  const separator = qualifiedName.lastIndexOf(":");
  return separator === -1 ? qualifiedName : qualifiedName.slice(separator + 1);
}

/**
 * Streams document markup through the tokenizer and yields every non-empty,
 * trimmed run of character data that appears once the `body` element has
 * opened. Lines are produced chunk by chunk, so a caller that stops early
 * never tokenizes the rest of the document.
 */
export function* linearize(xml: Buffer): Generator<string, void, undefined> {
  const parser = sax.parser(true);
  const pending: string[] = [];
  let insideBody = false;
  let failure: Error | undefined;

  const collect = (text: string) => {
    if (!insideBody) {
      return;
    }
    const line = text.trim();
    if (line) {
      pending.push(line);
    }
  };

  parser.onopentag = (tag) => {
    if (!insideBody && localName(tag.name).toLowerCase() === "body") {
      insideBody = true;
    }
  };
  parser.ontext = collect;
  parser.oncdata = collect;
  parser.onerror = (error) => {
    failure ??= error;
  };

  const raiseFailure = () => {
    if (failure) {
      throw new RecipeCardError("MALFORMED_DOCUMENT_BODY", `Unable to tokenize document body: ${failure.message}`, {
        cause: failure,
      });
    }
  };

  const decoder = new StringDecoder("utf8");
  for (let offset = 0; offset < xml.length; offset += CHUNK_SIZE) {
    parser.write(decoder.write(xml.subarray(offset, offset + CHUNK_SIZE)));
    raiseFailure();
    yield* pending.splice(0);
  }

  parser.write(decoder.end());
  raiseFailure();
  parser.close();
  raiseFailure();
  yield* pending.splice(0);
}
