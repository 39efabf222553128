/**
 * Notifications Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import { WahaSendTextRequestSchema } from "../schema.js";
import {
  buildSendTextUrl,
  buildWahaRequest,
  formatWhatsAppText,
  phoneToWhatsAppId,
} from "../transform.js";

describe("formatWhatsAppText", () => {
  it("bolds the subject above the body", () => {
    expect(formatWhatsAppText("Motion Sensor - Initial Alert", "line one\nline two")).toBe(
      "*Motion Sensor - Initial Alert*\n\nline one\nline two",
    );
  });
});

describe("phoneToWhatsAppId", () => {
  it("strips plus prefix, spaces and dashes", () => {
    expect(phoneToWhatsAppId("+31 6-1234 5678")).toBe("31612345678@c.us");
  });

  it("keeps a bare number as is", () => {
    expect(phoneToWhatsAppId("31612345678")).toBe("31612345678@c.us");
  });
});

describe("buildWahaRequest", () => {
  it("uses the default session", () => {
    expect(buildWahaRequest("1@c.us", "hi")).toEqual({
      chatId: "1@c.us",
      text: "hi",
      session: "default",
    });
  });

  it("uses a named session", () => {
    const request = buildWahaRequest("1@c.us", "hi", "ward-3");
    expect(request.session).toBe("ward-3");
    expect(WahaSendTextRequestSchema.safeParse(request).success).toBe(true);
  });
});

describe("buildSendTextUrl", () => {
  it("appends the sendText path", () => {
    expect(buildSendTextUrl("http://waha.test")).toBe("http://waha.test/api/sendText");
  });

  it("does not double a trailing slash", () => {
    expect(buildSendTextUrl("http://waha.test/")).toBe("http://waha.test/api/sendText");
  });
});
