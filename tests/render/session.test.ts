import { describe, it, expect } from "vitest";
import { RenderSession, withRenderSession } from "../../src/render/session.js";
import { UNAVAILABLE_CHANNEL } from "../../src/export/office_automation.js";
import { FakeChannel, FakeConversionEngine } from "../helpers/fakes.js";

describe("RenderSession", () => {
  it("builds the exporter from the given settings", async () => {
    const session = await RenderSession.open({
      export: { engine: "libreoffice", retries: 0 },
      _conversion: new FakeConversionEngine(),
    });

    expect(session.channel).toBe(UNAVAILABLE_CHANNEL);
    expect(session.exporter.settings).toEqual({
      engine: "libreoffice",
      retries: 0,
      pdfFilter: "pdf",
      pdfFilterOptions: "",
    });
    await session.close();
  });

  it("closes once", async () => {
    const channel = new FakeChannel(["docx"]);
    const session = await RenderSession.open({ _conversion: new FakeConversionEngine(), _channel: channel });

    await session.close();
    await session.close();

    expect(session.isClosed).toBe(true);
    expect(channel.disposed).toBe(1);
  });

  it("closes when the work throws", async () => {
    const channel = new FakeChannel();
    const opened: RenderSession[] = [];

    await expect(
      withRenderSession({ _conversion: new FakeConversionEngine(), _channel: channel }, async (session) => {
        opened.push(session);
        throw new Error("row loop exploded");
      }),
    ).rejects.toThrow("row loop exploded");

    expect(opened.map((s) => s.isClosed)).toEqual([true]);
    expect(channel.disposed).toBe(1);
  });
});
