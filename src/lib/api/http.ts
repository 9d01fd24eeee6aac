import { NextResponse } from "next/server";
import { APP_CONFIG } from "@/lib/constants/config";
import type { AnnouncementError } from "@/types/announcement";

type JsonRecord = Record<string, unknown>;

export function jsonError(
  status: number,
  error: string,
  extra: JsonRecord = {}
) {
  return NextResponse.json(
    {
      error,
      status,
      ...extra,
    },
    { status }
  );
}

export function jsonOk<T extends JsonRecord>(data: T, status = 200) {
  return NextResponse.json(
    {
      ...data,
      status,
    },
    { status }
  );
}

/** HTTP mapping for service errors. */
export function announcementErrorResponse(error: AnnouncementError) {
  switch (error.kind) {
    case "unauthenticated":
      return jsonError(401, "Login required", { redirectTo: APP_CONFIG.loginPath });
    case "forbidden":
      return jsonError(403, "Unauthorized", { reason: error.reason });
    case "not_found":
      return jsonError(404, "Announcement not found", { id: error.id });
    case "validation":
      return jsonError(400, error.message, {
        fields: error.fieldErrors,
        values: error.values,
      });
    case "storage":
      return jsonError(500, "Announcement storage unavailable");
  }
}

/** Parsed JSON body, or null when the body is missing or not a JSON object. */
export async function readJsonObject(req: Request): Promise<JsonRecord | null> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return null;
  }
  if (typeof body !== "object" || body === null || Array.isArray(body)) return null;
  return { ...body };
}
