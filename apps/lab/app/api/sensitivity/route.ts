import { NextResponse } from "next/server";
import { buildSensitivityResponse, sensitivityRequestSchema } from "./sensitivity";

/** One-at-a-time sensitivity of total carbon for a single product. */
export async function POST(request: Request) {
  try {
    const payload = sensitivityRequestSchema.parse(await request.json());
    return NextResponse.json(buildSensitivityResponse(payload));
  } catch (error) {
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "Sensitivity analysis failed" },
      { status: 400 },
    );
  }
}
