import type { FastifyPluginAsync } from "fastify";

type HealthRoutesOptions = {
  model: string;
  responderConfigured: boolean;
};

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, options) => {
  app.get("/health", async () => ({
    ok: true,
    model: options.model,
    responderConfigured: options.responderConfigured
  }));
};
