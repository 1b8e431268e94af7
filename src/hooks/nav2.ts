import { baseUrl, postService, speaker, type ServiceReply } from "./map-service.js";

export async function startNav2(context: Record<string, unknown>): Promise<ServiceReply> {
  const response = await postService(`${baseUrl(context)}/start/nav2`, "start Nav2");
  speaker(context)?.addPendingMessage("Navigation is ready.");
  return { status: "success", message: "Nav2 process initiated", response };
}

export async function stopNav2(context: Record<string, unknown>): Promise<ServiceReply> {
  const response = await postService(`${baseUrl(context)}/stop/nav2`, "stop Nav2");
  return { status: "success", message: "Nav2 process stopped", response };
}
