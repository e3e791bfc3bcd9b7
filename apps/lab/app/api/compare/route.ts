import { NextResponse } from "next/server";
import {
  buildCompareResponse,
  compareRequestSchema,
  type CompareRequestPayload,
} from "./comparison";

export async function POST(request: Request) {
  try {
    const json = await request.json();
    const payload: CompareRequestPayload = compareRequestSchema.parse(json);
    return NextResponse.json(buildCompareResponse(payload));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid comparison request";
    return NextResponse.json({ error: message }, { status: 400 });
  }
}
