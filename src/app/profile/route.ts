import { NextResponse } from 'next/server';
import { handleRoute } from '@/lib/http';
import type { DemoProfile } from '@/types/forecast';

const DEMO_PROFILE: DemoProfile = {
  name: 'Demo User',
  email: 'demo.user@example.com',
  role: 'Inventory Manager',
  joined: '2023-01-15',
};

// GET /profile — static demo record shown in the dashboard header
export async function GET() {
  return handleRoute('GET', '/profile', async () => NextResponse.json(DEMO_PROFILE));
}
