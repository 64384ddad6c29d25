import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { entry, keys, values } from "../../tests/utils/cache-test-helpers"
import type { CacheBackend } from "../cache-backend"
import { NO_VALUE } from "../cache-result"

type CreateBackend = () => CacheBackend

export function describeBackendContract(adapterName: string, createBackend: CreateBackend): void {
  describe(`CacheBackend Contract Tests - ${adapterName}`, () => {
    let backend: CacheBackend

    beforeEach(() => {
      backend = createBackend()
    })

    afterEach(async () => {
      await backend.close?.()
    })

    describe("get/set", () => {
      it("returns a miss when the key is absent", async () => {
        const res = await backend.get("missing")

        expect(res).toStrictEqual(NO_VALUE)
      })

      it("returns a hit carrying the stored envelope", async () => {
        const value = values.a()

        await backend.set(keys.one(), value)

        expect(await backend.get(keys.one())).toStrictEqual({ kind: "hit", value })
      })

      it("overwriting a key replaces the stored value", async () => {
        await backend.set(keys.one(), values.a())
        await backend.set(keys.one(), values.b())

        expect(await backend.get(keys.one())).toStrictEqual({ kind: "hit", value: values.b() })
      })

      it("stores a null payload as a hit", async () => {
        await backend.set(keys.one(), values.nil())

        expect(await backend.get(keys.one())).toStrictEqual({ kind: "hit", value: values.nil() })
      })
    })

    describe("getMulti", () => {
      it("returns an empty list for no keys", async () => {
        expect(await backend.getMulti([])).toStrictEqual([])
      })

      it("returns results aligned with the requested keys, misses included", async () => {
        await backend.set(keys.one(), values.a())
        await backend.set(keys.three(), values.c())

        const res = await backend.getMulti([keys.three(), keys.two(), keys.one()])

        expect(res).toStrictEqual([
          { kind: "hit", value: values.c() },
          NO_VALUE,
          { kind: "hit", value: values.a() },
        ])
      })
    })

    describe("setMulti", () => {
      it("writes every entry", async () => {
        await backend.setMulti([entry(keys.one(), values.a()), entry(keys.two(), values.b())])

        expect(await backend.getMulti([keys.one(), keys.two()])).toStrictEqual([
          { kind: "hit", value: values.a() },
          { kind: "hit", value: values.b() },
        ])
      })

      it("accepts an empty batch", async () => {
        await expect(backend.setMulti([])).resolves.toBeUndefined()
      })
    })

    describe("delete", () => {
      it("removes a stored key", async () => {
        await backend.set(keys.one(), values.a())
        await backend.delete(keys.one())

        expect(await backend.get(keys.one())).toStrictEqual(NO_VALUE)
      })

      it("deleting an absent key does not throw", async () => {
        await expect(backend.delete("missing")).resolves.toBeUndefined()
      })

      it("deleteMulti removes only the listed keys", async () => {
        await backend.setMulti([
          entry(keys.one(), values.a()),
          entry(keys.two(), values.b()),
          entry(keys.three(), values.c()),
        ])

        await backend.deleteMulti([keys.one(), keys.three(), "missing"])

        expect(await backend.getMulti([keys.one(), keys.two(), keys.three()])).toStrictEqual([
          NO_VALUE,
          { kind: "hit", value: values.b() },
          NO_VALUE,
        ])
      })
    })
  })
}
