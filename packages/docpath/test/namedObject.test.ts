import { describe, expect, it, vi } from "vitest"
import {
  DocPathError,
  hash,
  hashString,
  MissingNameError,
  NamedObject,
  NotFoundError,
} from "../src/index"
import { createDeployment } from "./fixtures"

function createLogger() {
  return { debug: vi.fn(), warn: vi.fn() }
}

describe("NamedObject", () => {
  describe("construction", () => {
    it("creates an object with a name", () => {
      const obj = NamedObject.create("web")
      expect(obj.root).toStrictEqual({ metadata: { name: "web" } })
      expect(obj.getName()).toBe("web")
    })

    it("requires a name or a name prefix", () => {
      expect(() => NamedObject.fromRecord({ metadata: {} })).toThrow(MissingNameError)
      expect(() => NamedObject.fromRecord({ kind: "Pod" })).toThrow(
        "object does not have a name set"
      )
      expect(NamedObject.fromRecord({ metadata: { generateName: "web-" } }).getName()).toBe(
        "web-"
      )
    })

    it("parses JSON documents", () => {
      const obj = NamedObject.fromJSON('{"kind":"Pod","metadata":{"name":"worker"}}')
      expect(obj.getKind()).toBe("Pod")
      expect(obj.getName()).toBe("worker")
    })

    it("rejects JSON that is not an object", () => {
      expect(() => NamedObject.fromJSON("[1, 2]")).toThrow(DocPathError)
      expect(() => NamedObject.fromJSON("[1, 2]")).toThrow("document is not a JSON object")
      expect(() => NamedObject.fromJSON("{")).toThrow(SyntaxError)
    })
  })

  describe("accessors", () => {
    it("reads common fields", () => {
      const obj = NamedObject.fromRecord(createDeployment())
      expect(obj.getName()).toBe("web")
      expect(obj.getKind()).toBe("Deployment")
      expect(obj.getVersion()).toBe("apps/v1")
      expect(obj.getNamespace()).toBe("")
      expect(obj.getUID()).toBe("")
      expect(obj.getOwnerKind()).toBe("")
    })

    it("sets name and namespace", () => {
      const obj = NamedObject.create("web")
      obj.setName("api")
      obj.setNamespace("prod")
      expect(obj.root).toStrictEqual({ metadata: { name: "api", namespace: "prod" } })
    })

    it("reads the kind of the first owner", () => {
      const obj = NamedObject.fromRecord({
        metadata: {
          name: "web-5d8f7",
          ownerReferences: [
            { apiVersion: "apps/v1", kind: "ReplicaSet", name: "web" },
            { apiVersion: "v1", kind: "Node", name: "node-1" },
          ],
        },
      })
      expect(obj.getOwnerKind()).toBe("ReplicaSet")
    })

    it("checks kind and version", () => {
      const obj = NamedObject.fromRecord(createDeployment())
      expect(obj.isOfKind("deployment", "APPS/V1")).toBe(true)
      expect(obj.isOfKind("", "apps/v1")).toBe(true)
      expect(obj.isOfKind("Deployment", "")).toBe(true)
      expect(obj.isOfKind("Pod", "")).toBe(false)
      expect(obj.isOfKind("Deployment", "v1")).toBe(false)

      const unkinded = NamedObject.create("web")
      expect(unkinded.isOfKind("", "")).toBe(true)
      expect(unkinded.isOfKind("Pod", "")).toBe(false)
    })
  })

  describe("labels and annotations", () => {
    it("reads and compares labels", () => {
      const obj = NamedObject.fromRecord(createDeployment())
      expect(obj.hasLabels()).toBe(true)
      expect(obj.getLabel("app")).toBe("web")
      expect(obj.isLabelSetTo("app", "WEB")).toBe(true)
      expect(obj.isLabelSetTo("missing", "")).toBe(false)
      expect(obj.isLabelNotSetTo("missing", "web")).toBe(true)
      expect(obj.isLabelNotSetTo("app", "web")).toBe(false)
      expect(() => obj.getLabel("missing")).toThrow(NotFoundError)
    })

    it("sets labels", () => {
      const logger = createLogger()
      const obj = NamedObject.fromRecord(createDeployment(), { logger })
      obj.setLabel("tier", "frontend")
      expect(obj.getSection(["metadata", "labels"])).toStrictEqual({
        app: "web",
        tier: "frontend",
      })
      expect(logger.debug).not.toHaveBeenCalled()
    })

    it("creates missing annotations", () => {
      const logger = createLogger()
      const obj = NamedObject.create("web", { logger })
      expect(obj.hasAnnotations()).toBe(false)

      obj.setAnnotation("example.com/owner", "team-a")

      expect(obj.getAnnotation("example.com/owner")).toBe("team-a")
      expect(obj.isAnnotationSetTo("example.com/owner", "Team-A")).toBe(true)
      expect(obj.isAnnotationNotSetTo("example.com/owner", "team-b")).toBe(true)
      expect(logger.debug).toHaveBeenCalledWith(
        "created /metadata/annotations to set /metadata/annotations/example.com~1owner"
      )
    })
  })

  describe("document operations", () => {
    it("delegates to the document functions", () => {
      const obj = NamedObject.fromRecord(createDeployment())
      expect(obj.get(["spec", "replicas"])).toBe(2)
      expect(obj.has(["spec", "replicas"])).toBe(true)
      expect(obj.walk(["spec", "containers", "-", "name"], { matchAll: true })).toStrictEqual([
        "app",
        "sidecar",
      ])
      expect(obj.findAll(["tags", "-"], "a")).toStrictEqual([
        ["tags", "0"],
        ["tags", "2"],
      ])
      expect(obj.findFirst(["spec", "containers", "-", "name"], "sidecar")).toStrictEqual([
        "spec",
        "containers",
        "1",
        "name",
      ])
      expect(obj.getList(["tags"])).toStrictEqual(["a", "b", "a"])
      expect(obj.getString(["kind"])).toBe("Deployment")
      expect(obj.generatePatch(["spec", "paused"], false)).toStrictEqual({
        path: ["spec", "paused"],
        value: false,
      })

      obj.set(["spec", "paused"], true)
      obj.delete(["tags"])
      expect(obj.get(["spec", "paused"])).toBe(true)
      expect(obj.has(["tags"])).toBe(false)
    })

    it("creates patch operations", () => {
      const obj = NamedObject.create("web")
      expect(obj.createAddPatch(["metadata", "labels"], { app: "web" })).toStrictEqual({
        op: "add",
        path: "/metadata/labels",
        value: { app: "web" },
      })
      expect(obj.createReplacePatch(["metadata", "name"], "api")).toStrictEqual({
        op: "replace",
        path: "/metadata/name",
        value: "api",
      })
      expect(obj.createRemovePatch(["metadata", "name"])).toStrictEqual({
        op: "remove",
        path: "/metadata/name",
      })
    })

    it("removes managed fields", () => {
      const obj = NamedObject.fromRecord({
        metadata: { name: "web", uid: "1234", resourceVersion: "12" },
        status: { phase: "Running" },
      })
      obj.removeManagedFields()
      expect(obj.getUID()).toBe("")
      expect(obj.root).toStrictEqual({ metadata: { name: "web" } })
    })

    it("removes custom fields", () => {
      const obj = NamedObject.fromRecord(createDeployment())
      obj.removeManagedFields({ fields: ["tags", "empty", "nothing"], nested: { spec: {} } })
      expect(obj.root).toStrictEqual({
        apiVersion: "apps/v1",
        kind: "Deployment",
        metadata: { name: "web", labels: { app: "web" } },
      })
    })

    it("hashes and serializes the document", () => {
      const obj = NamedObject.fromRecord(createDeployment())
      expect(obj.hash()).toBe(hash(createDeployment()))
      expect(obj.hashString()).toBe(hashString(createDeployment()))
      expect(JSON.stringify(obj)).toBe(JSON.stringify(createDeployment()))
    })
  })
})
