import { NextResponse } from "next/server";
import {
  assessRequestSchema,
  buildAssessResponse,
  type AssessRequestPayload,
} from "./assessment";

export async function POST(request: Request) {
  try {
    const json = await request.json();
    const payload: AssessRequestPayload = assessRequestSchema.parse(json);
    return NextResponse.json(buildAssessResponse(payload));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid assessment request";
    return NextResponse.json({ error: message }, { status: 400 });
  }
}
