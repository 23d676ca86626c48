import Fastify, { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import fastifyCookie from "@fastify/cookie";
import fastifyFormBody from "@fastify/formbody";
import { z } from "zod";
import { PageRouter } from "./routes/pageRouter";
import { renderLayout } from "./views/layout";
import { notice } from "./views/components";
import type { CompletionClient } from "./services/completionService";
import type { SessionContext, SessionRegistry } from "./services/sessionService";
import type { FormInput, PageController, ViewContext } from "./controllers/types";

export const SESSION_COOKIE = "sid";

export interface AppDependencies {
  completions: CompletionClient;
  sessions: SessionRegistry;
  /** Root logger; Fastify derives `request.log` from it. */
  logger: FastifyBaseLogger;
  now?: () => Date;
  secureCookies?: boolean;
}

const formInputSchema = z.record(z.union([z.string(), z.array(z.string())]));

function toFormInput(value: unknown): FormInput {
  const parsed = formInputSchema.safeParse(value ?? {});
  return parsed.success ? parsed.data : {};
}

/**
 * Build the dashboard server. Nothing is listening until `listen` is called.
 * @param deps - The shared completion client and session registry
 */
export function buildApp(deps: AppDependencies): FastifyInstance {
  const fastify = Fastify({ logger: deps.logger });
  fastify.register(fastifyCookie);
  fastify.register(fastifyFormBody);

  const router = new PageRouter();
  const now = deps.now ?? (() => new Date());

  // Resolve the browser's session, creating one (and its cookie) on first contact
  const openSession = (request: FastifyRequest, reply: FastifyReply): SessionContext => {
    const { session, created } = deps.sessions.open(request.cookies[SESSION_COOKIE]);
    if (created) {
      request.log.info({ sessionId: session.id }, "Session started");
      reply.setCookie(SESSION_COOKIE, session.id, {
        path: "/",
        httpOnly: true,
        sameSite: "lax",
        secure: deps.secureCookies ?? false,
      });
    }
    return session;
  };

  const viewContext = (request: FastifyRequest, reply: FastifyReply): ViewContext => ({
    session: openSession(request, reply),
    completions: deps.completions,
    now,
    log: request.log,
  });

  const sendPage = (reply: FastifyReply, controller: PageController, body: string) =>
    reply.type("text/html; charset=utf-8").send(renderLayout(controller.title, router.navigation(controller.page), body));

  const sendNotFound = (reply: FastifyReply, slug: string) =>
    reply
      .code(404)
      .type("text/html; charset=utf-8")
      .send(renderLayout("Not found", router.navigation("home"), notice("warning", `Unknown page: ${slug.replace(/[^\w-]/g, "")}`)));

  fastify.get("/health", async () => ({ status: "ok", sessions: deps.sessions.size }));

  const showPage = (slug: string, request: FastifyRequest, reply: FastifyReply) => {
    const controller = router.resolve(slug);
    if (!controller) return sendNotFound(reply, slug);
    return sendPage(reply, controller, controller.render(viewContext(request, reply), toFormInput(request.query)));
  };

  fastify.get("/", async (request: FastifyRequest, reply: FastifyReply) => showPage("home", request, reply));

  fastify.post("/assistant/clear", async (request: FastifyRequest, reply: FastifyReply) => {
    router.assistant.clear(viewContext(request, reply));
    return reply.code(303).redirect("/assistant");
  });

  fastify.post("/session/end", async (request: FastifyRequest, reply: FastifyReply) => {
    const sessionId = request.cookies[SESSION_COOKIE];
    if (sessionId && deps.sessions.end(sessionId)) {
      request.log.info({ sessionId }, "Session ended");
    }
    reply.clearCookie(SESSION_COOKIE, { path: "/" });
    return reply.code(303).redirect("/");
  });

  fastify.get<{ Params: { page: string } }>("/:page", async (request, reply) => showPage(request.params.page, request, reply));

  fastify.post<{ Params: { page: string } }>("/:page", async (request, reply) => {
    const controller = router.resolve(request.params.page);
    if (!controller) return sendNotFound(reply, request.params.page);
    const body = await controller.submit(viewContext(request, reply), toFormInput(request.body));
    return sendPage(reply, controller, body);
  });

  fastify.addHook("onClose", async () => {
    deps.sessions.disposeAll();
  });

  return fastify;
}
