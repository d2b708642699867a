/**
 * Readline prompter tests over in-memory streams.
 *
 * Run: node --import tsx src/cli/prompter.test.ts
 */

import { strict as assert } from "node:assert";
import { PassThrough, Writable } from "node:stream";

import { createReadlinePrompter, InputClosedError } from "./prompter.js";

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function streams(): { input: PassThrough; output: Writable; written: () => string } {
  const input = new PassThrough();
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { input, output, written: () => chunks.join("") };
}

await test("answers come back in order, including lines typed ahead", async () => {
  const { input, output, written } = streams();
  const prompter = createReadlinePrompter({ input, output });
  input.write("first\nsecond\n");

  assert.equal(await prompter.ask("Q1: "), "first");
  assert.equal(await prompter.ask("Q2: "), "second");
  assert.ok(written().includes("Q1: "));
  assert.ok(written().includes("Q2: "));
  prompter.close();
});

await test("end of input rejects the pending question", async () => {
  const { input, output } = streams();
  const prompter = createReadlinePrompter({ input, output });
  const pending = prompter.ask("Name: ");
  input.end();

  await assert.rejects(pending, (err: unknown) => {
    assert.ok(err instanceof InputClosedError);
    assert.equal(err.reason, "eof");
    return true;
  });
  await assert.rejects(prompter.ask("Again: "), InputClosedError);
  prompter.close();
});

await test("close rejects later questions", async () => {
  const { input, output } = streams();
  const prompter = createReadlinePrompter({ input, output });
  prompter.close();
  await assert.rejects(prompter.ask("Late: "), InputClosedError);
});

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
