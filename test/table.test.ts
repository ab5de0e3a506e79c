import test from "node:test";
import assert from "node:assert/strict";
import { renderTable } from "../src/lib/table";

test("renderTable pads columns to the widest cell", () => {
  const output = renderTable(["ID", "STATUS"], [
    ["warden-alice-1", "running"],
    ["w2", "stopped"]
  ]);

  assert.equal(
    output,
    ["ID              STATUS", "--------------  -------", "warden-alice-1  running", "w2              stopped"].join("\n")
  );
});

test("renderTable right-aligns numeric columns and clips long cells", () => {
  const output = renderTable([{ header: "PORT", align: "right" }, { header: "REASON", maxWidth: 8 }], [
    ["10000", "CPU usage 95.0%"],
    ["7", "ok"]
  ]);

  assert.equal(output, [" PORT  REASON", "-----  --------", "10000  CPU u...", "    7  ok"].join("\n"));
});

test("renderTable returns an empty string without rows", () => {
  assert.equal(renderTable(["ID"], []), "");
});
