// =============================================================================
// Layers — wiring the adapters chosen by Settings
// =============================================================================
//
//   Settings ──► PgClient ──► Migrations + PostgresSubscriptionRepository
//            ──► EmailService (HTTP provider, or console when unconfigured)
//            ──► NodeHttpServer ──► ApiLive
//
// Program.ts launches the result. Nothing here runs until a Layer is built.
//
import { Layer, Option } from "effect"
import {
  FetchHttpClient,
  type HttpClient,
  HttpApiBuilder,
  HttpMiddleware,
  HttpServer
} from "@effect/platform"
import { NodeContext, NodeHttpServer } from "@effect/platform-node"
import { PgClient } from "@effect/sql-pg"
import { createServer } from "node:http"

import type { DatabaseSettings, EmailClientSettings, Settings } from "./Configuration.js"
import type { EmailService } from "./EmailService.js"
import { ApiLive } from "./http/Api.js"
import { UuidIdGeneratorLive } from "./IdGenerator.js"
import { ConsoleEmailService } from "./infrastructure/ConsoleEmailService.js"
import { HttpEmailService } from "./infrastructure/HttpEmailService.js"
import { MigrationsLive } from "./infrastructure/Migrations.js"
import { PostgresSubscriptionRepository } from "./infrastructure/PostgresSubscriptionRepository.js"

export const makeEmailLayer = (
  emailClient: Option.Option<EmailClientSettings>,
  httpClient: Layer.Layer<HttpClient.HttpClient> = FetchHttpClient.layer
): Layer.Layer<EmailService> =>
  Option.match(emailClient, {
    onNone: () => ConsoleEmailService,
    onSome: (client) =>
      HttpEmailService({
        baseUrl: client.baseUrl,
        sender: client.sender,
        authorizationToken: client.authorizationToken,
        timeout: Option.getOrUndefined(client.timeout)
      }).pipe(Layer.provide(httpClient))
  })

// Migrations finish before the repository is handed out
export const makePersistenceLayer = (database: DatabaseSettings) =>
  Layer.mergeAll(PostgresSubscriptionRepository, MigrationsLive).pipe(
    Layer.provide(
      Layer.mergeAll(
        PgClient.layer({
          host: database.host,
          port: database.port,
          username: database.username,
          password: database.password,
          database: database.databaseName,
          ssl: database.requireSsl
        }),
        NodeContext.layer,
        UuidIdGeneratorLive
      )
    )
  )

export const makeServerLayer = (settings: Settings) => {
  const { application, database, emailClient } = settings

  const AppDependencies = Layer.mergeAll(
    makePersistenceLayer(database),
    makeEmailLayer(emailClient),
    UuidIdGeneratorLive
  )

  return HttpApiBuilder.serve(HttpMiddleware.logger).pipe(
    Layer.provide(ApiLive),
    Layer.provide(AppDependencies),
    HttpServer.withLogAddress,
    Layer.provide(NodeHttpServer.layer(createServer, { host: application.host, port: application.port }))
  )
}
