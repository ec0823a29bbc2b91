// =============================================================================
// Configuration
// =============================================================================
//
// Settings are read with Effect's Config from environment variables:
//
//   APP__<SECTION>__<KEY>     e.g. APP__DATABASE__HOST, APP__EMAIL_CLIENT__BASE_URL
//
// APP__ENVIRONMENT selects the defaults ("local" unless set):
//
//                         local        production
//   application.host      127.0.0.1    0.0.0.0
//   database.requireSsl   false        true
//
// The email client section is optional as a whole. Without it the service
// logs emails instead of sending them (ConsoleEmailService).
//
import {
  Config,
  ConfigError,
  ConfigProvider,
  Duration,
  Effect,
  Either,
  LogLevel,
  Option,
  Redacted
} from "effect"
import { SubscriberEmail } from "./domain/subscriber/SubscriberEmail.js"

export type Environment = "local" | "production"

export interface ApplicationSettings {
  readonly host: string
  readonly port: number
  readonly logLevel: LogLevel.LogLevel
}

export interface DatabaseSettings {
  readonly host: string
  readonly port: number
  readonly username: string
  readonly password: Redacted.Redacted
  readonly databaseName: string
  readonly requireSsl: boolean
}

export interface EmailClientSettings {
  readonly baseUrl: string
  readonly sender: SubscriberEmail
  readonly authorizationToken: Redacted.Redacted
  readonly timeout: Option.Option<Duration.Duration>
}

export interface Settings {
  readonly environment: Environment
  readonly application: ApplicationSettings
  readonly database: DatabaseSettings
  readonly emailClient: Option.Option<EmailClientSettings>
}

// =============================================================================
// Sections
// =============================================================================

const application = (environment: Environment): Config.Config<ApplicationSettings> =>
  Config.all({
    host: Config.string("host").pipe(
      Config.withDefault(environment === "production" ? "0.0.0.0" : "127.0.0.1")
    ),
    port: Config.integer("port").pipe(Config.withDefault(8000)),
    logLevel: Config.logLevel("logLevel").pipe(Config.withDefault(LogLevel.Info))
  }).pipe(Config.nested("application"))

const database = (environment: Environment): Config.Config<DatabaseSettings> =>
  Config.all({
    host: Config.string("host").pipe(Config.withDefault("localhost")),
    port: Config.integer("port").pipe(Config.withDefault(5432)),
    username: Config.string("username").pipe(Config.withDefault("postgres")),
    password: Config.redacted("password"),
    databaseName: Config.string("databaseName").pipe(Config.withDefault("newsletter")),
    requireSsl: Config.boolean("requireSsl").pipe(
      Config.withDefault(environment === "production")
    )
  }).pipe(Config.nested("database"))

// The sender must itself be a valid subscriber email; checked at startup.
const senderEmail = Config.string("senderEmail").pipe(
  Config.mapOrFail((raw) =>
    SubscriberEmail.parse(raw).pipe(
      Either.mapLeft((error) => ConfigError.InvalidData(["senderEmail"], error.message))
    )
  )
)

const emailClient: Config.Config<Option.Option<EmailClientSettings>> = Config.all({
  baseUrl: Config.string("baseUrl"),
  sender: senderEmail,
  authorizationToken: Config.redacted("authorizationToken"),
  timeout: Config.option(Config.integer("timeoutMillis")).pipe(
    Config.map(Option.map((millis) => Duration.millis(millis)))
  )
}).pipe(Config.nested("emailClient"), Config.option)

// =============================================================================
// Settings
// =============================================================================

const environment = Config.literal("local", "production")("environment").pipe(
  Config.withDefault<Environment>("local")
)

// The environment is read first: it picks the defaults of the other sections.
export const Settings: Effect.Effect<Settings, ConfigError.ConfigError> = Effect.gen(function* () {
  const current = yield* environment
  return yield* Config.all({
    environment: Config.succeed(current),
    application: application(current),
    database: database(current),
    emailClient
  })
})

// APP__DATABASE__DATABASE_NAME → database.databaseName
export const EnvConfigProvider = ConfigProvider.fromEnv({ pathDelim: "__", seqDelim: "," }).pipe(
  ConfigProvider.constantCase,
  ConfigProvider.nested("APP")
)
