import fs from "node:fs/promises";
import path from "node:path";

export type ArtifactType = "logs" | "audit_actions";

export function resolveVoxdeskRoot(workspaceDir: string) {
  return path.join(workspaceDir, ".voxdesk");
}

export function resolveArtifactPath(workspaceDir: string, type: ArtifactType) {
  const root = resolveVoxdeskRoot(workspaceDir);
  switch (type) {
    case "logs":
      return path.join(root, "logs.jsonl");
    case "audit_actions":
      return path.join(root, "audit", "actions.jsonl");
  }
}

async function ensureDirForFile(filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

export async function writeArtifact(workspaceDir: string, type: ArtifactType, payload: unknown): Promise<void> {
  const filePath = resolveArtifactPath(workspaceDir, type);
  await ensureDirForFile(filePath);
  await fs.appendFile(filePath, JSON.stringify(payload) + "\n", "utf-8");
}
