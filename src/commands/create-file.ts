import pc from "picocolors";
import { formatBytes, resolvePath, writeText } from "../core/utils.js";

export async function createFileCommand(filename: string, content: string): Promise<void> {
  const filePath = resolvePath(filename);
  writeText(filePath, content);

  console.log(
    pc.green(`✅ File ${filePath} created successfully`) +
      pc.dim(` (${formatBytes(Buffer.byteLength(content))})`)
  );
}
