import { baseUrl, postService, speaker, type ServiceReply } from "./map-service.js";

export async function startSlam(context: Record<string, unknown>): Promise<ServiceReply> {
  const response = await postService(`${baseUrl(context)}/start/slam`, "start SLAM");
  return { status: "success", message: "SLAM process initiated", response };
}

/** Saves the map under `context.map_name` (default "map") before stopping SLAM. */
export async function stopSlam(context: Record<string, unknown>): Promise<ServiceReply> {
  const base = baseUrl(context);
  const mapName = typeof context.map_name === "string" && context.map_name ? context.map_name : "map";

  await postService(`${base}/maps/save`, "save SLAM map", { map_name: mapName }, 10_000);
  speaker(context)?.addPendingMessage("Map has been saved successfully.");

  const response = await postService(`${base}/stop/slam`, "stop SLAM", undefined, 10_000);
  return { status: "success", message: "SLAM process stopped", response };
}
