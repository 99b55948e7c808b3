import test from "node:test";
import assert from "node:assert/strict";
import { SearchResults } from "../SearchResults.js";

test("fromQuery keeps the parallel sequences aligned", () => {
  const results = SearchResults.fromQuery([
    { id: "a", document: "first", metadata: { course_title: "A", lesson_number: 1 }, distance: 0.1 },
    { id: "b", document: "second", metadata: { course_title: "A" }, distance: 0.4 },
  ]);

  assert.deepEqual(results.documents, ["first", "second"]);
  assert.deepEqual(results.metadata, [{ course_title: "A", lesson_number: 1 }, { course_title: "A" }]);
  assert.deepEqual(results.distances, [0.1, 0.4]);
  assert.equal(results.error, undefined);
  assert.equal(results.isEmpty(), false);
});

test("empty results carry the error and no matches", () => {
  const failed = SearchResults.empty("Search error: offline");
  assert.equal(failed.error, "Search error: offline");
  assert.deepEqual([failed.documents, failed.metadata, failed.distances], [[], [], []]);
  assert.equal(failed.isEmpty(), true);

  assert.equal(SearchResults.fromQuery([]).isEmpty(), true);
  assert.equal(SearchResults.empty().error, undefined);
});
