import { Type, type Static } from "@sinclair/typebox";

const NonEmptyString = Type.String({ minLength: 1, pattern: "\\S" });
const Port = Type.Integer({ minimum: 1, maximum: 65_535 });
const Millis = Type.Integer({ minimum: 0 });

export const ForwardingModeSchema = Type.Union([Type.Literal("local"), Type.Literal("remote")]);

export const RemoteHostSchema = Type.Object(
  {
    host: NonEmptyString,
    port: Type.Optional(Port),
    user: NonEmptyString,
    identityFile: Type.Optional(NonEmptyString),
  },
  { additionalProperties: false },
);

export const HealthSettingsSchema = Type.Object(
  {
    intervalMs: Type.Optional(Type.Integer({ minimum: 100 })),
    timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
    failureThreshold: Type.Optional(Type.Integer({ minimum: 1 })),
    warmupMs: Type.Optional(Millis),
  },
  { additionalProperties: false },
);

export const BackoffSettingsSchema = Type.Object(
  {
    baseMs: Type.Optional(Type.Integer({ minimum: 1 })),
    maxMs: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false },
);

export const ShutdownSettingsSchema = Type.Object(
  {
    graceMs: Type.Optional(Millis),
    timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false },
);

export const JournalSettingsSchema = Type.Object(
  {
    enabled: Type.Optional(Type.Boolean()),
    dir: Type.Optional(NonEmptyString),
  },
  { additionalProperties: false },
);

export const LoggingSettingsSchema = Type.Object(
  {
    level: Type.Optional(
      Type.Union([
        Type.Literal("debug"),
        Type.Literal("info"),
        Type.Literal("warn"),
        Type.Literal("error"),
        Type.Literal("silent"),
      ]),
    ),
    format: Type.Optional(Type.Union([Type.Literal("pretty"), Type.Literal("json")])),
  },
  { additionalProperties: false },
);

export const TunwatchConfigSchema = Type.Object(
  {
    mode: Type.Optional(ForwardingModeSchema),
    remote: RemoteHostSchema,
    forwards: Type.Array(NonEmptyString, { minItems: 1 }),
    health: Type.Optional(HealthSettingsSchema),
    backoff: Type.Optional(BackoffSettingsSchema),
    shutdown: Type.Optional(ShutdownSettingsSchema),
    journal: Type.Optional(JournalSettingsSchema),
    logging: Type.Optional(LoggingSettingsSchema),
  },
  { additionalProperties: false },
);

export type TunwatchConfig = Static<typeof TunwatchConfigSchema>;
export type RemoteHostConfig = Static<typeof RemoteHostSchema>;
