const MIB = 1024 * 1024;

export const config = {
  port: Number(process.env.PORT ?? 4810),
  host: process.env.HOST ?? "0.0.0.0",
  corsOrigin: process.env.CORS_ORIGIN ?? "",
  bodyLimitBytes: Number(process.env.BODY_LIMIT_BYTES ?? 8 * MIB),
  playerDir: process.env.PLAYER_DIR ?? "img/player/",
  lootDir: process.env.LOOT_DIR ?? "img/loot/",
  exportDir: process.env.EXPORT_DIR ?? "export",
  logLevel: process.env.LOG_LEVEL ?? "info"
};

export type AppConfig = typeof config;
