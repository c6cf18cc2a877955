/**
 * Account Lookup Adapter
 * Resolves an authenticated user's role and vendor link using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { parseEnum } from '@/lib/supabase.js';
import type { Account } from '@/types/index.js';
import { ROLES } from '@/types/index.js';

/**
 * Database row types
 */
interface ProfileRow {
  id: string;
  role: string;
}

interface VendorLinkRow {
  id: string;
}

/**
 * Create the account resolver used by the auth middleware
 */
export function createAccountResolver(
  supabase: SupabaseClient
): (userId: string) => Promise<Account | null> {
  return async function resolveAccount(userId: string): Promise<Account | null> {
    const { data: profile, error } = await supabase
      .from('profiles')
      .select('id, role')
      .eq('id', userId)
      .maybeSingle();

    if (error !== null) {
      throw new Error(`Failed to get profile: ${error.message}`);
    }
    if (profile === null) {
      return null;
    }

    const role = parseEnum(ROLES, (profile as ProfileRow).role, 'profiles.role');

    const { data: vendor, error: vendorError } = await supabase
      .from('vendors')
      .select('id')
      .eq('user_id', userId)
      .maybeSingle();

    if (vendorError !== null) {
      throw new Error(`Failed to get vendor link: ${vendorError.message}`);
    }

    return {
      role,
      vendorId: vendor === null ? null : (vendor as VendorLinkRow).id,
    };
  };
}
