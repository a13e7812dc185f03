import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { parseCriteriaList, parseDocument, parseDocumentList, parseRequestBody } from "../../api/request.parsers";
import { InvalidInputError } from "../../shared/errors";

describe("request parsers", () => {
  it("decodes a base64 document", () => {
    const document = parseDocument({ fileName: " jane.pdf ", contentBase64: "aGVsbG8=" }, "document");
    assert.equal(document.fileName, "jane.pdf");
    assert.equal(document.content.toString("utf8"), "hello");
  });

  it("rejects malformed documents", () => {
    assert.throws(() => parseDocument(undefined, "document"), InvalidInputError);
    assert.throws(() => parseDocument({ contentBase64: "aGVsbG8=" }, "document"), /document.fileName is required/);
    assert.throws(() => parseDocument({ fileName: "a.pdf" }, "document"), /document.contentBase64 is required/);
    assert.throws(
      () => parseDocument({ fileName: "a.pdf", contentBase64: "not base64!" }, "document"),
      /not valid base64/,
    );
  });

  it("indexes errors inside document lists", () => {
    assert.throws(() => parseDocumentList([], "resumes"), /resumes must be a non-empty array/);
    assert.throws(
      () => parseDocumentList([{ fileName: "a.pdf", contentBase64: "aGVsbG8=" }, {}], "resumes"),
      /resumes\[1\].fileName is required/,
    );
  });

  it("trims criteria and rejects empty entries", () => {
    assert.deepEqual(parseCriteriaList([" CS degree ", "Python"]), ["CS degree", "Python"]);
    assert.throws(() => parseCriteriaList([]), InvalidInputError);
    assert.throws(() => parseCriteriaList(["Python", "  "]), InvalidInputError);
    assert.throws(() => parseCriteriaList(["Python", 3]), InvalidInputError);
    assert.throws(() => parseCriteriaList("Python"), InvalidInputError);
  });

  it("requires a JSON object body", () => {
    assert.throws(() => parseRequestBody([]), InvalidInputError);
    assert.deepEqual(parseRequestBody({ a: 1 }), { a: 1 });
  });
});
