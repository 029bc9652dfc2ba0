import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { exportCmd } from "../src/commands/export.js";
import { initCmd } from "../src/commands/init.js";
import { loadCmd } from "../src/commands/load.js";
import { FieldCoercionError, MalformedRowError } from "../src/errors.js";
import { LANDHOLDER_FIELDS } from "../src/services/fieldCleaner.js";
import { LandholderStore } from "../src/services/landholderStore.js";

const FIRST = [
  'Ælfric,M,Aelfric 1," held land, freely ",2.5,1,0,0,0,Jones,confirmed',
  "Thorkil,M,Thorkil 92,held of the king, in Essex,1,0,0,0.50,0,Smith,draft",
].join("\n");

async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "domesday-cmd-"));
}

async function readBack(database: string) {
  const store = new LandholderStore(database);
  try {
    return store.records();
  } finally {
    store.close();
  }
}

test("load repairs, cleans and stores a CSV file", async () => {
  const dir = await tempDir();
  const csv = path.join(dir, "pase.csv");
  const database = path.join(dir, "pase.sqlite");
  await fs.writeFile(csv, FIRST + "\n", "utf8");

  const summary = await loadCmd({ csv, database });
  assert.deepEqual(summary, { rowsRead: 2, rowsRepaired: 1, storedRows: 2 });

  const records = await readBack(database);
  assert.equal(records[0]?.name, "Ælfric");
  assert.equal(records[0]?.description, "held land, freely");
  assert.equal(records[1]?.description, "held of the king, in Essex");
});

test("load keeps a description with quotes inside the cell", async () => {
  const dir = await tempDir();
  const database = path.join(dir, "pase.sqlite");
  const csv = Readable.from([
    'Ælfric,M,Aelfric 1,"held land, "freely"",2.5,1,0,0,0,Jones,confirmed\n',
    'Thorkil,M,Thorkil 92,"the Dane" of Essex,1,0,0,0,0,Smith,draft\n',
  ]);

  const summary = await loadCmd({ csv, database });
  assert.deepEqual(summary, { rowsRead: 2, rowsRepaired: 0, storedRows: 2 });

  const records = await readBack(database);
  assert.equal(records[0]?.description, "held land, freely");
  assert.equal(records[1]?.description, "the Dane of Essex");
  assert.equal(records[1]?.editor, "Smith");
});

test("reloading a key with an empty editor clears it", async () => {
  const dir = await tempDir();
  const database = path.join(dir, "pase.sqlite");
  await loadCmd({ csv: Readable.from([FIRST]), database });
  await loadCmd({
    csv: Readable.from(['Ælfric,M,Aelfric 1,"held land, freely",2.5,1,0,0,0,,confirmed\n']),
    database,
  });

  const records = await readBack(database);
  assert.equal(records.length, 2);
  const aelfric = records.find((r) => r.pase_name === "Aelfric 1");
  assert.equal(aelfric?.editor, null);
});

test("a malformed row leaves the database empty", async () => {
  const dir = await tempDir();
  const database = path.join(dir, "pase.sqlite");
  const bad = FIRST + "\nGodwine,M,Godwine 3,a priest\n";
  await assert.rejects(loadCmd({ csv: Readable.from([bad]), database }), MalformedRowError);
  assert.equal((await readBack(database)).length, 0);
});

test("--strict rejects a holding that is not a decimal", async () => {
  const dir = await tempDir();
  const database = path.join(dir, "pase.sqlite");
  const csv = Readable.from(["Ælfric,M,Aelfric 1,held land,2.5,abc,0,0,0,Jones,confirmed\n"]);
  await assert.rejects(loadCmd({ csv, database, strict: true }), FieldCoercionError);
});

test("init creates an empty database", async () => {
  const dir = await tempDir();
  const database = path.join(dir, "fresh", "pase.sqlite");
  await initCmd(database);
  await initCmd(database);
  assert.equal((await readBack(database)).length, 0);
});

test("export writes the table as CSV", async () => {
  const dir = await tempDir();
  const database = path.join(dir, "pase.sqlite");
  const out = path.join(dir, "out", "landholders.csv");
  await loadCmd({ csv: Readable.from([FIRST]), database });

  const rows = await exportCmd({ database, out });
  assert.equal(rows, 2);
  const [header] = (await fs.readFile(out, "utf8")).split("\n");
  assert.equal(header, LANDHOLDER_FIELDS.join(","));
});
