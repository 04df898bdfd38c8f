import type { Context, RequestHandler } from "@usercache/server"
import type { KeyValueServices } from "../composition"

export function setStringHandler({
  passthrough,
}: KeyValueServices): RequestHandler {
  return async (c: Context) => {
    await passthrough.setString(c.req.query("key"), c.req.query("value"))

    return c.body(null, 200)
  }
}

export function getStringHandler({
  passthrough,
}: KeyValueServices): RequestHandler {
  return async (c: Context) => {
    const key = c.req.query("key")
    const value = await passthrough.getString(key)

    return c.text(`Value for key ${key}: ${value}\n`)
  }
}

export function setListHandler({
  passthrough,
}: KeyValueServices): RequestHandler {
  return async (c: Context) => {
    await passthrough.pushList(c.req.query("key"), c.req.queries("value") ?? [])

    return c.body(null, 200)
  }
}

export function getListHandler({
  passthrough,
}: KeyValueServices): RequestHandler {
  return async (c: Context) => {
    const key = c.req.query("key")
    const values = await passthrough.rangeList(key)

    return c.text(`Values for key ${key}: [${values.join(" ")}]\n`)
  }
}

export function setHashHandler({
  passthrough,
}: KeyValueServices): RequestHandler {
  return async (c: Context) => {
    await passthrough.setHashField(
      c.req.query("key"),
      c.req.query("field"),
      c.req.query("value"),
    )

    return c.body(null, 200)
  }
}

export function getHashHandler({
  passthrough,
}: KeyValueServices): RequestHandler {
  return async (c: Context) => {
    const key = c.req.query("key")
    const field = c.req.query("field")
    const value = await passthrough.getHashField(key, field)

    return c.text(`Value for field ${field} in key ${key}: ${value}\n`)
  }
}
