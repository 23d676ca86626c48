import { afterEach, describe, it, expect } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp, SESSION_COOKIE } from "../app";
import { CompletionClient } from "../services/completionService";
import { SessionRegistry } from "../services/sessionService";
import { FakeGenerator, silentLogger } from "./fakes";
import type { FakeReply } from "./fakes";

const FORM = { "content-type": "application/x-www-form-urlencoded" };

let fastify: FastifyInstance | undefined;

function setup(reply?: (prompt: string) => FakeReply) {
  const generator = new FakeGenerator(reply);
  const sessions = new SessionRegistry(60_000);
  const completions = new CompletionClient(generator, "test-model", silentLogger);
  fastify = buildApp({ completions, sessions, logger: silentLogger, now: () => new Date(2026, 0, 2, 3, 4, 5) });
  return { app: fastify, generator, sessions };
}

function sessionCookie(response: { cookies: Array<{ name: string; value: string }> }): string {
  const cookie = response.cookies.find((c) => c.name === SESSION_COOKIE);
  if (!cookie) throw new Error("no session cookie set");
  return cookie.value;
}

afterEach(async () => {
  await fastify?.close();
  fastify = undefined;
});

describe("pages", () => {
  it("renders the home page and starts a session", async () => {
    const { app, sessions } = setup();

    const response = await app.inject({ method: "GET", url: "/" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(response.body).toContain('<a href="/" class="active">🏠 Home</a>');
    expect(response.body).toContain("🌍 Key Focus Areas");
    expect(sessions.get(sessionCookie(response))).toBeDefined();
  });

  it("returns 404 for an unknown page", async () => {
    const { app } = setup();

    const response = await app.inject({ method: "GET", url: "/weather" });

    expect(response.statusCode).toBe(404);
    expect(response.body).toContain("Unknown page: weather");
  });

  it("reports health", async () => {
    const { app } = setup();

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.json()).toEqual({ status: "ok", sessions: 0 });
  });

  it("shows timestamped insights on the home page", async () => {
    const { app, generator } = setup(() => '{"insight1": "Heat pumps"}');

    const response = await app.inject({ method: "POST", url: "/home" });

    expect(generator.calls[0]?.prompt).toContain("Format as JSON with keys: insight1, insight2, insight3");
    expect(response.body).toContain("✅ Latest insights generated!");
    expect(response.body).toContain("<strong>AI-Generated Insights (2026-01-02 03:04:05)</strong>");
  });
});

describe("green technologies", () => {
  it("sends the selected building type and climate, then shows the metrics", async () => {
    const { app, generator } = setup(() => "1. Cool roofs");

    const response = await app.inject({
      method: "POST",
      url: "/green-technologies",
      headers: FORM,
      payload: "buildingType=Residential&climateZone=Arid",
    });

    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0]?.prompt).toContain("Residential");
    expect(generator.calls[0]?.prompt).toContain("Arid");
    expect(generator.calls[0]?.model).toBe("test-model");
    expect(response.body).toContain("✅ Recommendations ready!");
    expect(response.body).toContain('<div class="metric-value">40-60%</div>');
    expect(response.body).toContain('<option value="Arid" selected>Arid</option>');
  });

  it("shows a failure inline and stays usable", async () => {
    let fail = true;
    const { app } = setup(() => (fail ? new Error("401 invalid api key") : "Recovered"));

    const failed = await app.inject({
      method: "POST",
      url: "/green-technologies",
      headers: FORM,
      payload: "buildingType=Commercial&climateZone=Cold",
    });
    fail = false;
    const retried = await app.inject({
      method: "POST",
      url: "/green-technologies",
      headers: FORM,
      payload: "buildingType=Commercial&climateZone=Cold",
    });

    expect(failed.statusCode).toBe(200);
    expect(failed.body).toContain('<div class="alert alert-error">[ERROR] 401 invalid api key</div>');
    expect(failed.body).not.toContain("Potential Energy Savings");
    expect(retried.body).toContain("✅ Recommendations ready!");
  });
});

describe("smart solutions", () => {
  it("does not call the service for a category that is not offered", async () => {
    const { app, generator } = setup();

    const response = await app.inject({ method: "POST", url: "/solutions", headers: FORM, payload: "category=Smart+Weather" });

    expect(generator.calls).toHaveLength(0);
    expect(response.body).toContain("Please provide: category");
  });
});

describe("analytics", () => {
  it("sends technology and investment for ROI", async () => {
    const { app, generator } = setup(() => "Payback in 6 years");

    const response = await app.inject({
      method: "POST",
      url: "/analytics",
      headers: FORM,
      payload: "analysis=technology-roi&technology=Solar+Panels&investment=50000",
    });

    expect(generator.calls[0]?.prompt).toContain("50000");
    expect(generator.calls[0]?.prompt).toContain("Solar Panels");
    expect(response.body).toContain("✅ ROI calculated!");
  });

  it("compares every selected city", async () => {
    const { app, generator } = setup();

    await app.inject({
      method: "POST",
      url: "/analytics",
      headers: FORM,
      payload: "analysis=city-comparison&cities=Tokyo&cities=Vienna",
    });

    expect(generator.calls[0]?.prompt).toContain("initiatives: Tokyo, Vienna");
  });

  it("requires a scenario before assessing impact", async () => {
    const { app, generator } = setup();

    const response = await app.inject({
      method: "POST",
      url: "/analytics",
      headers: FORM,
      payload: "analysis=impact-assessment&scenario=++",
    });

    expect(generator.calls).toHaveLength(0);
    expect(response.body).toContain("Please provide: scenario");
  });

  it("preselects the default cities", async () => {
    const { app } = setup();

    const response = await app.inject({ method: "GET", url: "/analytics?analysis=city-comparison" });

    expect(response.body).toContain('value="Singapore" checked');
    expect(response.body).toContain('value="Copenhagen" checked');
    expect(response.body).not.toContain('value="Tokyo" checked');
  });
});

describe("assistant", () => {
  it("records the question and the answer in the session conversation", async () => {
    const { app, sessions } = setup(() => "A green roof is...");

    const response = await app.inject({
      method: "POST",
      url: "/assistant",
      headers: FORM,
      payload: "question=What+is+a+green+roof%3F",
    });
    const sid = sessionCookie(response);

    expect(sessions.get(sid)?.conversation.all()).toEqual([
      { role: "user", content: "What is a green roof?" },
      { role: "assistant", content: "A green roof is..." },
    ]);
  });

  it("re-renders the history on the next visit", async () => {
    const { app } = setup(() => "A green roof is...");
    const first = await app.inject({
      method: "POST",
      url: "/assistant",
      headers: FORM,
      payload: "question=What+is+a+green+roof%3F",
    });

    const page = await app.inject({ method: "GET", url: "/assistant", cookies: { [SESSION_COOKIE]: sessionCookie(first) } });

    expect(page.body).toContain("<p>What is a green roof?</p>");
    expect(page.body).toContain("<p>A green roof is...</p>");
  });

  it("keeps each browser session separate", async () => {
    const { app, sessions } = setup();
    const first = await app.inject({ method: "POST", url: "/assistant", headers: FORM, payload: "question=Hello" });

    const other = await app.inject({ method: "GET", url: "/assistant" });

    expect(sessionCookie(other)).not.toBe(sessionCookie(first));
    expect(sessions.get(sessionCookie(other))?.conversation.all()).toEqual([]);
    expect(sessions.get(sessionCookie(first))?.conversation.size).toBe(2);
  });

  it("keeps only the user turn when the answer fails", async () => {
    const { app, sessions } = setup(() => new Error("network down"));

    const response = await app.inject({ method: "POST", url: "/assistant", headers: FORM, payload: "question=Hello" });

    expect(response.body).toContain("[ERROR] network down");
    expect(sessions.get(sessionCookie(response))?.conversation.all()).toEqual([{ role: "user", content: "Hello" }]);
  });

  it("stores the question exactly as typed", async () => {
    const { app, generator, sessions } = setup();

    const response = await app.inject({
      method: "POST",
      url: "/assistant",
      headers: FORM,
      payload: "question=++What+is+a+green+roof%3F++",
    });

    expect(generator.calls[0]?.prompt).toContain("practically:   What is a green roof?  \n");
    expect(sessions.get(sessionCookie(response))?.conversation.all()[0]).toEqual({
      role: "user",
      content: "  What is a green roof?  ",
    });
  });

  it("does not render script links typed into the chat", async () => {
    const { app } = setup();

    const response = await app.inject({
      method: "POST",
      url: "/assistant",
      headers: FORM,
      payload: "question=" + encodeURIComponent("[click](javascript:alert(1))"),
    });

    expect(response.body).toContain('<p><a href="#">click</a></p>');
    expect(response.body).not.toContain("javascript:alert");
  });

  it("ignores an empty question", async () => {
    const { app, generator, sessions } = setup();

    const response = await app.inject({ method: "POST", url: "/assistant", headers: FORM, payload: "question=+" });

    expect(generator.calls).toHaveLength(0);
    expect(sessions.get(sessionCookie(response))?.conversation.size).toBe(0);
  });

  it("clears the history", async () => {
    const { app, sessions } = setup();
    const first = await app.inject({ method: "POST", url: "/assistant", headers: FORM, payload: "question=Hello" });
    const sid = sessionCookie(first);

    const cleared = await app.inject({ method: "POST", url: "/assistant/clear", cookies: { [SESSION_COOKIE]: sid } });

    expect(cleared.statusCode).toBe(303);
    expect(cleared.headers["location"]).toBe("/assistant");
    expect(sessions.get(sid)?.conversation.size).toBe(0);
  });
});

describe("session lifecycle", () => {
  it("disposes the session when it is ended", async () => {
    const { app, sessions } = setup();
    const first = await app.inject({ method: "GET", url: "/" });
    const sid = sessionCookie(first);

    const ended = await app.inject({ method: "POST", url: "/session/end", cookies: { [SESSION_COOKIE]: sid } });

    expect(ended.statusCode).toBe(303);
    expect(sessions.get(sid)).toBeUndefined();
  });

  it("disposes every session when the server closes", async () => {
    const { app, sessions } = setup();
    await app.inject({ method: "GET", url: "/" });

    await app.close();
    fastify = undefined;

    expect(sessions.size).toBe(0);
  });
});
