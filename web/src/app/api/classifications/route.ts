import { NextResponse } from "next/server";
import { createSupabaseClassificationStore, parseRecordFilter } from "@/lib/classificationStore";
import { getServerConfig } from "@/lib/serverConfig";
import { getSupabaseAdmin } from "@/lib/supabaseAdmin";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  const supabase = getSupabaseAdmin();
  if (!supabase) {
    return NextResponse.json(
      { error: "Server misconfigured: Missing Service Role Key" },
      { status: 500 }
    );
  }

  const filter = parseRecordFilter(new URL(request.url).searchParams);

  try {
    const store = createSupabaseClassificationStore(supabase, getServerConfig().classificationsTable);
    const records = await store.listRecords(filter);
    return NextResponse.json({ records });
  } catch (err) {
    console.error("API Error:", err);
    return NextResponse.json({ error: "Failed to load classifications" }, { status: 500 });
  }
}
