// Example scripts run during `npm test` so they stay correct for readers.
import { describe, it } from "vitest";

describe("examples", () => {
  it("peek_header_demo runs on import", async () => {
    await import("../peek_header_demo.ts");
  });
});
