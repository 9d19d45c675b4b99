import assert from "node:assert/strict";
import { test } from "node:test";

import { buildStatusServer } from "../src/server.js";

test("status routes expose the snapshot and health", async () => {
  const app = await buildStatusServer({
    source: {
      snapshot: () => ({ dir_files: ["a.xml", "notes.txt"], working_files: ["a.xml"] }),
      size: () => 1,
    },
  });

  try {
    const status = await app.inject({ method: "GET", url: "/" });
    assert.equal(status.statusCode, 200);
    assert.deepEqual(status.json(), { dir_files: ["a.xml", "notes.txt"], working_files: ["a.xml"] });

    const health = await app.inject({ method: "GET", url: "/health" });
    assert.equal(health.statusCode, 200);
    assert.deepEqual(health.json(), { ok: true, working: 1 });

    const missing = await app.inject({ method: "GET", url: "/nope" });
    assert.equal(missing.statusCode, 404);
  } finally {
    await app.close();
  }
});

test("an empty directory reports empty lists", async () => {
  const app = await buildStatusServer({
    source: { snapshot: () => ({ dir_files: [], working_files: [] }), size: () => 0 },
  });
  try {
    const res = await app.inject({ method: "GET", url: "/" });
    assert.deepEqual(res.json(), { dir_files: [], working_files: [] });
  } finally {
    await app.close();
  }
});
