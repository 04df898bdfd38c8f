import { type MockProxy, mock } from "vitest-mock-extended"
import type { MySqlClient } from "../../../../lib/mysql-client"
import { bootstrapUserSchema } from "../user-schema.mysql"

describe("bootstrapUserSchema", () => {
  let connection: MockProxy<MySqlClient>
  let pool: MockProxy<MySqlClient>

  beforeEach(() => {
    connection = mock<MySqlClient>()
    pool = mock<MySqlClient>()
    connection.query.mockResolvedValue([{ affectedRows: 1 }, undefined])
    pool.query.mockResolvedValue([{ affectedRows: 0 }, undefined])
  })

  it("creates the database on the server connection, then the table on the pool", async () => {
    await bootstrapUserSchema({ connection, pool, database: "temporary" })

    expect(connection.query).toHaveBeenCalledWith(
      "CREATE DATABASE IF NOT EXISTS `temporary`",
    )
    expect(pool.query).toHaveBeenCalledWith(
      expect.stringMatching(/^CREATE TABLE IF NOT EXISTS users \(/),
    )
    expect(pool.query.mock.calls[0]?.[0]).toContain(
      "id INT AUTO_INCREMENT PRIMARY KEY",
    )
  })

  it("quotes the database name", async () => {
    await bootstrapUserSchema({ connection, pool, database: "odd`name" })

    expect(connection.query).toHaveBeenCalledWith(
      "CREATE DATABASE IF NOT EXISTS `odd``name`",
    )
  })

  it("skips the table when the database cannot be created", async () => {
    connection.query.mockRejectedValue(new Error("ER_DBACCESS_DENIED_ERROR"))

    await expect(
      bootstrapUserSchema({ connection, pool, database: "temporary" }),
    ).rejects.toThrow("ER_DBACCESS_DENIED_ERROR")
    expect(pool.query).not.toHaveBeenCalled()
  })
})
