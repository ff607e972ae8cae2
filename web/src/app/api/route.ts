import { NextResponse } from 'next/server'

const ROUTES = ['GET /api', 'GET /api/rooms', 'GET /api/rooms/:id']

// GET /api - list the available endpoints
export async function GET() {
  return NextResponse.json(ROUTES)
}
