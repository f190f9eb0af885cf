/**
 * src/shared/db/migrations/0003_rls_policies.ts
 *
 * WHY:
 * - Access policy is enforced by Postgres RLS, keyed on auth.uid() and profiles.is_superuser.
 * - Helper functions are SECURITY DEFINER so policies on `profiles` can read
 *   `profiles` without recursing into themselves.
 *
 * POLICIES:
 * - profiles: read own row; superusers read all; update own row without touching
 *             is_superuser, org_id or is_activated (those change only on the service connection).
 * - orgs:     read own org; superusers read all and create.
 * - brands:   any authenticated user reads; superusers insert/update/delete.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`
    CREATE OR REPLACE FUNCTION public.is_superuser()
    RETURNS boolean
    LANGUAGE sql STABLE SECURITY DEFINER
    SET search_path = public
    AS $$
      SELECT COALESCE((SELECT is_superuser FROM public.profiles WHERE id = auth.uid()), FALSE)
    $$;

    CREATE OR REPLACE FUNCTION public.current_org_id()
    RETURNS bigint
    LANGUAGE sql STABLE SECURITY DEFINER
    SET search_path = public
    AS $$
      SELECT org_id FROM public.profiles WHERE id = auth.uid()
    $$;

    CREATE OR REPLACE FUNCTION public.current_is_activated()
    RETURNS boolean
    LANGUAGE sql STABLE SECURITY DEFINER
    SET search_path = public
    AS $$
      SELECT COALESCE((SELECT is_activated FROM public.profiles WHERE id = auth.uid()), FALSE)
    $$;
  `.execute(db);

  await sql`
    ALTER TABLE public.profiles ENABLE ROW LEVEL SECURITY;
    ALTER TABLE public.orgs ENABLE ROW LEVEL SECURITY;
    ALTER TABLE public.brands ENABLE ROW LEVEL SECURITY;
  `.execute(db);

  await sql`
    CREATE POLICY "profiles_select_own" ON public.profiles
      FOR SELECT USING (auth.uid() = id);

    CREATE POLICY "profiles_select_superuser" ON public.profiles
      FOR SELECT USING (public.is_superuser());

    CREATE POLICY "profiles_update_own" ON public.profiles
      FOR UPDATE USING (auth.uid() = id)
      WITH CHECK (
        auth.uid() = id
        AND is_superuser = public.is_superuser()
        AND org_id IS NOT DISTINCT FROM public.current_org_id()
        AND is_activated = public.current_is_activated()
      );

    CREATE POLICY "orgs_select_own" ON public.orgs
      FOR SELECT USING (org_id = public.current_org_id());

    CREATE POLICY "orgs_select_superuser" ON public.orgs
      FOR SELECT USING (public.is_superuser());

    CREATE POLICY "orgs_insert_superuser" ON public.orgs
      FOR INSERT WITH CHECK (public.is_superuser());

    CREATE POLICY "brands_select_authenticated" ON public.brands
      FOR SELECT USING (auth.role() = 'authenticated');

    CREATE POLICY "brands_insert_superuser" ON public.brands
      FOR INSERT WITH CHECK (public.is_superuser());

    CREATE POLICY "brands_update_superuser" ON public.brands
      FOR UPDATE USING (public.is_superuser());

    CREATE POLICY "brands_delete_superuser" ON public.brands
      FOR DELETE USING (public.is_superuser());
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await sql`
    DROP POLICY IF EXISTS "brands_delete_superuser" ON public.brands;
    DROP POLICY IF EXISTS "brands_update_superuser" ON public.brands;
    DROP POLICY IF EXISTS "brands_insert_superuser" ON public.brands;
    DROP POLICY IF EXISTS "brands_select_authenticated" ON public.brands;
    DROP POLICY IF EXISTS "orgs_insert_superuser" ON public.orgs;
    DROP POLICY IF EXISTS "orgs_select_superuser" ON public.orgs;
    DROP POLICY IF EXISTS "orgs_select_own" ON public.orgs;
    DROP POLICY IF EXISTS "profiles_update_own" ON public.profiles;
    DROP POLICY IF EXISTS "profiles_select_superuser" ON public.profiles;
    DROP POLICY IF EXISTS "profiles_select_own" ON public.profiles;

    ALTER TABLE public.brands DISABLE ROW LEVEL SECURITY;
    ALTER TABLE public.orgs DISABLE ROW LEVEL SECURITY;
    ALTER TABLE public.profiles DISABLE ROW LEVEL SECURITY;

    DROP FUNCTION IF EXISTS public.current_is_activated();
    DROP FUNCTION IF EXISTS public.current_org_id();
    DROP FUNCTION IF EXISTS public.is_superuser();
  `.execute(db);
}
