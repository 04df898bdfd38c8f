import { BaseError } from "@usercache/errors"

export class ConfigError extends BaseError<"config_invalid"> {
  constructor(details: string, issues: number) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { issues },
    })
  }
}
