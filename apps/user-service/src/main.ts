import { run } from "./server"

run().catch((err: unknown) => {
  console.error("Server failed to start", err)
  process.exit(1)
})
