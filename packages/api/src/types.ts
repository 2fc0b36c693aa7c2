/**
 * Hono environment shared by the app, middleware and routes
 */
export type AppEnv = {
  Variables: {
    requestId: string;
  };
};
