import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { isRecipeCardError } from "../src/lib/errors";
import { linearize } from "../src/pipeline/linearize";

function lines(xml: string): string[] {
  return [...linearize(Buffer.from(xml, "utf-8"))];
}

describe("linearize", () => {
  it("emits one trimmed line per text run inside the body", () => {
    const xml =
      "<body><p>Grandma's Recipe</p><p>Apple Pie</p><p>Ingredients:</p><p>2 cups flour</p></body>";

    assert.deepEqual(lines(xml), ["Grandma's Recipe", "Apple Pie", "Ingredients:", "2 cups flour"]);
  });

  it("drops text outside the body and blank runs", () => {
    const xml = [
      '<w:document xmlns:w="urn:test">',
      "<w:settings><w:name>Ignored</w:name></w:settings>",
      "<w:body>",
      "<w:p>   Serves   </w:p>",
      "<w:p>    </w:p>",
      "<w:p>\n\t4\n</w:p>",
      "</w:body>",
      "</w:document>",
    ].join("\n");

    assert.deepEqual(lines(xml), ["Serves", "4"]);
  });

  it("matches the body element name case-insensitively", () => {
    assert.deepEqual(lines("<doc><BODY><p>Tips</p></BODY></doc>"), ["Tips"]);
  });

  it("keeps collecting after the body element closes", () => {
    assert.deepEqual(lines("<doc><body><p>a</p></body><p>b</p></doc>"), ["a", "b"]);
  });

  it("decodes entities and CDATA", () => {
    const xml = "<body><p>Salt &amp; pepper</p><p><![CDATA[  1 < 2  ]]></p></body>";

    assert.deepEqual(lines(xml), ["Salt & pepper", "1 < 2"]);
  });

  it("returns nothing for a document without a body", () => {
    assert.deepEqual(lines("<doc><p>Recipe</p></doc>"), []);
  });

  it("keeps multi-byte characters intact across chunk boundaries", () => {
    const prefix = "<body><p>";
    const filler = "x".repeat(64 * 1024 - prefix.length - 1);
    const xml = `${prefix}${filler}é crème</p></body>`;

    assert.deepEqual(lines(xml), [`${filler}é crème`]);
  });

  it("yields early lines before reading the rest of the document", () => {
    const comment = `<!--${"x".repeat(80 * 1024)}-->`;
    const xml = `<doc><body><p>first</p>${comment}<p>broken</q></body></doc>`;
    const iterator = linearize(Buffer.from(xml, "utf-8"));

    assert.deepEqual(iterator.next(), { value: "first", done: false });
    assert.throws(
      () => iterator.next(),
      (error: unknown) => isRecipeCardError(error, "MALFORMED_DOCUMENT_BODY"),
    );
  });

  it("fails with MALFORMED_DOCUMENT_BODY on broken markup", () => {
    assert.throws(
      () => lines("<body><p>open</body>"),
      (error: unknown) => isRecipeCardError(error, "MALFORMED_DOCUMENT_BODY"),
    );
  });
});
