import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { NextFunction, Request, Response } from "express";
import { AppModule } from "./app.module";
import { resolveDataDir } from "./common/config/data-dir";
import {
  isAllowedOrigin,
  parseCorsRules,
  parsePositiveInt,
} from "./common/config/http";

type CorsCallback = (err: Error | null, allow?: boolean) => void;

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger("Bootstrap");
  const slowRequestMs = parsePositiveInt(process.env.SLOW_REQUEST_LOG_MS, 400);

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startAt = process.hrtime.bigint();
    res.on("finish", () => {
      const endAt = process.hrtime.bigint();
      const durationMs = Number(endAt - startAt) / 1_000_000;
      if (durationMs >= slowRequestMs) {
        logger.warn(
          `[SLOW] ${req.method} ${req.originalUrl || req.url} ${res.statusCode} ${durationMs.toFixed(1)}ms`,
        );
      }
    });
    next();
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const corsRules = parseCorsRules();
  app.enableCors({
    origin: (origin: string | undefined, callback: CorsCallback) => {
      if (!origin || isAllowedOrigin(origin, corsRules)) {
        callback(null, true);
        return;
      }

      callback(new Error(`Origin ${origin} is not allowed by CORS`));
    },
  });
  app.enableShutdownHooks();

  const port = parsePositiveInt(process.env.PORT, 4001);
  await app.listen(port);

  logger.log(`API running on http://localhost:${port}`);
  logger.log(`Data files resolve against ${resolveDataDir()}`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(
    "Failed to start",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
