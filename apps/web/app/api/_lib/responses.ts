import { NextResponse } from "next/server";

export function notFoundResponse(message: string): NextResponse {
  return NextResponse.json({ message }, { status: 404 });
}

export function badRequestResponse(message: string): NextResponse {
  return NextResponse.json({ message }, { status: 400 });
}

export function conflictResponse(message: string, code?: string): NextResponse {
  return NextResponse.json(code ? { message, code } : { message }, { status: 409 });
}

export function serverErrorResponse(message: string): NextResponse {
  return NextResponse.json({ message }, { status: 500 });
}
