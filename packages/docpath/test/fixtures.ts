import type { JSONRecord } from "../src/index"

/**
 * A fresh deployment-like document for every call.
 */
export function createDeployment(): JSONRecord {
  return {
    apiVersion: "apps/v1",
    kind: "Deployment",
    metadata: {
      name: "web",
      labels: { app: "web" },
    },
    spec: {
      replicas: 2,
      containers: [
        { name: "app", image: "app:1", ports: [{ port: 80 }] },
        { name: "sidecar", image: "proxy:2" },
      ],
    },
    tags: ["a", "b", "a"],
    empty: [],
    nothing: null,
  }
}
