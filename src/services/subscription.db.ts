/**
 * SubscriptionService Database Adapter
 * Implements SubscriptionServiceDb interface using Supabase
 *
 * SCOPE: Plans, vendor subscriptions, subscription payments, usage records
 *
 * Payment completion + rollover and the usage increment run inside
 * Postgres functions (see supabase/migrations) so each is one statement
 * from the adapter's point of view.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import {
  NOT_FOUND_CODE,
  parseEnum,
  toDateOrNull,
  toIsoOrNull,
} from '@/lib/supabase.js';
import type {
  BillingOutcome,
  Payment,
  Plan,
  PlanFeature,
  ScheduledPlanChange,
  Subscription,
  SubscriptionStatus,
  UsageRecord,
} from '@/types/index.js';
import {
  BILLING_CYCLES,
  PAYMENT_METHODS,
  PAYMENT_STATUSES,
  PLAN_TYPES,
  SUBSCRIPTION_STATUSES,
} from '@/types/index.js';

import type {
  NewPayment,
  NewSubscription,
  NewUsageRecord,
  PaymentPatch,
  SubscriptionPatch,
  SubscriptionServiceDb,
} from './subscription.service.js';

/**
 * Database row types
 */
interface PlanRow {
  id: string;
  name: string;
  description: string | null;
  plan_type: string;
  base_price_cents: number;
  billing_cycle: string;
  setup_fee_cents: number | null;
  features: Record<string, { enabled?: boolean; limit?: number | null }> | null;
  max_products: number | null;
  max_orders_per_month: number | null;
  max_storage_mb: number | null;
  is_active: boolean;
  is_featured: boolean;
  sort_order: number;
  trial_days: number | null;
}

interface ScheduledPlanChangeJson {
  new_plan_id: string;
  previous_plan_id: string;
  effective_at: string;
}

interface SubscriptionRow {
  id: string;
  vendor_id: string;
  plan_id: string;
  billing_cycle: string;
  status: string;
  start_date: string;
  end_date: string | null;
  trial_end_date: string | null;
  current_period_start: string;
  current_period_end: string;
  next_billing_date: string | null;
  amount_cents: number;
  currency: string;
  auto_renew: boolean;
  cancelled_at: string | null;
  cancellation_reason: string | null;
  scheduled_plan_change: ScheduledPlanChangeJson | null;
  version: number;
  created_at: string;
  updated_at: string;
}

interface PaymentRow {
  id: string;
  subscription_id: string;
  vendor_id: string;
  amount_cents: number;
  currency: string;
  status: string;
  payment_method: string;
  transaction_id: string | null;
  payment_date: string | null;
  due_date: string | null;
  billing_period_start: string;
  billing_period_end: string;
  failure_reason: string | null;
  retry_count: number;
  created_at: string;
  updated_at: string;
}

interface UsageRecordRow {
  id: string;
  subscription_id: string;
  vendor_id: string;
  feature_name: string;
  usage_count: number;
  usage_limit: number | null;
  period_start: string;
  period_end: string;
  metadata: Record<string, unknown> | null;
}

/**
 * Map database row to Plan entity
 */
function mapRowToPlan(row: PlanRow): Plan {
  const features: Record<string, PlanFeature> = {};
  for (const [name, value] of Object.entries(row.features ?? {})) {
    features[name] = {
      enabled: value.enabled ?? true,
      limit: value.limit ?? null,
    };
  }

  return {
    id: row.id,
    name: row.name,
    description: row.description,
    planType: parseEnum(PLAN_TYPES, row.plan_type, 'plans.plan_type'),
    basePrice: Number(row.base_price_cents),
    billingCycle: parseEnum(BILLING_CYCLES, row.billing_cycle, 'plans.billing_cycle'),
    setupFee: row.setup_fee_cents === null ? null : Number(row.setup_fee_cents),
    features,
    maxProducts: row.max_products,
    maxOrdersPerMonth: row.max_orders_per_month,
    maxStorageMb: row.max_storage_mb,
    isActive: row.is_active,
    isFeatured: row.is_featured,
    sortOrder: row.sort_order,
    trialDays: row.trial_days,
  };
}

function mapScheduledChange(
  json: ScheduledPlanChangeJson | null
): ScheduledPlanChange | null {
  if (json === null) {
    return null;
  }
  return {
    newPlanId: json.new_plan_id,
    previousPlanId: json.previous_plan_id,
    effectiveAt: new Date(json.effective_at),
  };
}

function scheduledChangeToJson(
  change: ScheduledPlanChange | null
): ScheduledPlanChangeJson | null {
  if (change === null) {
    return null;
  }
  return {
    new_plan_id: change.newPlanId,
    previous_plan_id: change.previousPlanId,
    effective_at: change.effectiveAt.toISOString(),
  };
}

/**
 * Map database row to Subscription entity
 */
function mapRowToSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    vendorId: row.vendor_id,
    planId: row.plan_id,
    billingCycle: parseEnum(
      BILLING_CYCLES,
      row.billing_cycle,
      'subscriptions.billing_cycle'
    ),
    status: parseEnum(SUBSCRIPTION_STATUSES, row.status, 'subscriptions.status'),
    startDate: new Date(row.start_date),
    endDate: toDateOrNull(row.end_date),
    trialEndDate: toDateOrNull(row.trial_end_date),
    currentPeriodStart: new Date(row.current_period_start),
    currentPeriodEnd: new Date(row.current_period_end),
    nextBillingDate: toDateOrNull(row.next_billing_date),
    amount: Number(row.amount_cents),
    currency: row.currency,
    autoRenew: row.auto_renew,
    cancelledAt: toDateOrNull(row.cancelled_at),
    cancellationReason: row.cancellation_reason,
    scheduledPlanChange: mapScheduledChange(row.scheduled_plan_change),
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Map database row to Payment entity
 */
function mapRowToPayment(row: PaymentRow): Payment {
  return {
    id: row.id,
    subscriptionId: row.subscription_id,
    vendorId: row.vendor_id,
    amount: Number(row.amount_cents),
    currency: row.currency,
    status: parseEnum(PAYMENT_STATUSES, row.status, 'subscription_payments.status'),
    paymentMethod: parseEnum(
      PAYMENT_METHODS,
      row.payment_method,
      'subscription_payments.payment_method'
    ),
    transactionId: row.transaction_id,
    paymentDate: toDateOrNull(row.payment_date),
    dueDate: toDateOrNull(row.due_date),
    billingPeriodStart: new Date(row.billing_period_start),
    billingPeriodEnd: new Date(row.billing_period_end),
    failureReason: row.failure_reason,
    retryCount: row.retry_count,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Map database row to UsageRecord entity
 */
function mapRowToUsageRecord(row: UsageRecordRow): UsageRecord {
  return {
    id: row.id,
    subscriptionId: row.subscription_id,
    vendorId: row.vendor_id,
    featureName: row.feature_name,
    usageCount: row.usage_count,
    usageLimit: row.usage_limit,
    periodStart: new Date(row.period_start),
    periodEnd: new Date(row.period_end),
    metadata: row.metadata ?? {},
  };
}

/**
 * Only the keys present in the patch are written
 */
function subscriptionPatchToRow(
  patch: SubscriptionPatch
): Record<string, unknown> {
  const row: Record<string, unknown> = {
    updated_at: patch.updatedAt.toISOString(),
  };
  if (patch.planId !== undefined) {
    row.plan_id = patch.planId;
  }
  if (patch.status !== undefined) {
    row.status = patch.status;
  }
  if (patch.endDate !== undefined) {
    row.end_date = toIsoOrNull(patch.endDate);
  }
  if (patch.currentPeriodStart !== undefined) {
    row.current_period_start = patch.currentPeriodStart.toISOString();
  }
  if (patch.currentPeriodEnd !== undefined) {
    row.current_period_end = patch.currentPeriodEnd.toISOString();
  }
  if (patch.nextBillingDate !== undefined) {
    row.next_billing_date = toIsoOrNull(patch.nextBillingDate);
  }
  if (patch.amount !== undefined) {
    row.amount_cents = patch.amount;
  }
  if (patch.autoRenew !== undefined) {
    row.auto_renew = patch.autoRenew;
  }
  if (patch.cancelledAt !== undefined) {
    row.cancelled_at = toIsoOrNull(patch.cancelledAt);
  }
  if (patch.cancellationReason !== undefined) {
    row.cancellation_reason = patch.cancellationReason;
  }
  if (patch.scheduledPlanChange !== undefined) {
    row.scheduled_plan_change = scheduledChangeToJson(patch.scheduledPlanChange);
  }
  return row;
}

function paymentPatchToRow(patch: PaymentPatch): Record<string, unknown> {
  const row: Record<string, unknown> = {
    updated_at: patch.updatedAt.toISOString(),
  };
  if (patch.status !== undefined) {
    row.status = patch.status;
  }
  if (patch.transactionId !== undefined) {
    row.transaction_id = patch.transactionId;
  }
  if (patch.paymentDate !== undefined) {
    row.payment_date = toIsoOrNull(patch.paymentDate);
  }
  if (patch.failureReason !== undefined) {
    row.failure_reason = patch.failureReason;
  }
  if (patch.retryCount !== undefined) {
    row.retry_count = patch.retryCount;
  }
  return row;
}

/**
 * Create SubscriptionServiceDb implementation using Supabase
 */
export function createSubscriptionServiceDb(
  supabase: SupabaseClient
): SubscriptionServiceDb {
  async function fetchSubscription(
    subscriptionId: string
  ): Promise<Subscription | null> {
    const { data, error } = await supabase
      .from('subscriptions')
      .select('*')
      .eq('id', subscriptionId)
      .single();

    if (error !== null) {
      if (error.code === NOT_FOUND_CODE) {
        return null;
      }
      throw new Error(`Failed to get subscription: ${error.message}`);
    }

    return mapRowToSubscription(data as SubscriptionRow);
  }

  async function fetchPayment(paymentId: string): Promise<Payment | null> {
    const { data, error } = await supabase
      .from('subscription_payments')
      .select('*')
      .eq('id', paymentId)
      .single();

    if (error !== null) {
      if (error.code === NOT_FOUND_CODE) {
        return null;
      }
      throw new Error(`Failed to get payment: ${error.message}`);
    }

    return mapRowToPayment(data as PaymentRow);
  }

  async function fetchUsageRecord(recordId: string): Promise<UsageRecord> {
    const { data, error } = await supabase
      .from('usage_records')
      .select('*')
      .eq('id', recordId)
      .single();

    if (error !== null) {
      throw new Error(`Failed to get usage record: ${error.message}`);
    }

    return mapRowToUsageRecord(data as UsageRecordRow);
  }

  return {
    async vendorExists(vendorId: string): Promise<boolean> {
      const { data, error } = await supabase
        .from('vendors')
        .select('id')
        .eq('id', vendorId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get vendor: ${error.message}`);
      }
      return data !== null;
    },

    /**
     * List all active plans
     */
    async listPlans(): Promise<Plan[]> {
      const { data, error } = await supabase
        .from('plans')
        .select('*')
        .eq('is_active', true)
        .order('sort_order', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to list plans: ${error.message}`);
      }

      return ((data ?? []) as PlanRow[]).map(mapRowToPlan);
    },

    /**
     * Get plan by ID
     */
    async getPlan(planId: string): Promise<Plan | null> {
      const { data, error } = await supabase
        .from('plans')
        .select('*')
        .eq('id', planId)
        .single();

      if (error !== null) {
        if (error.code === NOT_FOUND_CODE) {
          return null;
        }
        throw new Error(`Failed to get plan: ${error.message}`);
      }

      return mapRowToPlan(data as PlanRow);
    },

    getSubscription: fetchSubscription,

    async findSubscriptionsByVendor(vendorId: string): Promise<Subscription[]> {
      const { data, error } = await supabase
        .from('subscriptions')
        .select('*')
        .eq('vendor_id', vendorId)
        .order('created_at', { ascending: false });

      if (error !== null) {
        throw new Error(
          `Failed to get subscriptions for vendor: ${error.message}`
        );
      }

      return ((data ?? []) as SubscriptionRow[]).map(mapRowToSubscription);
    },

    async findSubscriptionsByStatus(
      statuses: SubscriptionStatus[]
    ): Promise<Subscription[]> {
      const { data, error } = await supabase
        .from('subscriptions')
        .select('*')
        .in('status', statuses);

      if (error !== null) {
        throw new Error(
          `Failed to get subscriptions by status: ${error.message}`
        );
      }

      return ((data ?? []) as SubscriptionRow[]).map(mapRowToSubscription);
    },

    /**
     * Insert a subscription; the partial unique index on vendor_id
     * rejects a second active/trial row
     */
    async createSubscription(
      subscription: NewSubscription
    ): Promise<Subscription> {
      const { data, error } = await supabase
        .from('subscriptions')
        .insert({
          vendor_id: subscription.vendorId,
          plan_id: subscription.planId,
          billing_cycle: subscription.billingCycle,
          status: subscription.status,
          start_date: subscription.startDate.toISOString(),
          end_date: toIsoOrNull(subscription.endDate),
          trial_end_date: toIsoOrNull(subscription.trialEndDate),
          current_period_start: subscription.currentPeriodStart.toISOString(),
          current_period_end: subscription.currentPeriodEnd.toISOString(),
          next_billing_date: toIsoOrNull(subscription.nextBillingDate),
          amount_cents: subscription.amount,
          currency: subscription.currency,
          auto_renew: subscription.autoRenew,
          cancelled_at: toIsoOrNull(subscription.cancelledAt),
          cancellation_reason: subscription.cancellationReason,
          scheduled_plan_change: scheduledChangeToJson(
            subscription.scheduledPlanChange
          ),
        })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to create subscription: ${error.message}`);
      }

      return mapRowToSubscription(data as SubscriptionRow);
    },

    async updateSubscription(
      subscriptionId: string,
      expectedVersion: number,
      patch: SubscriptionPatch
    ): Promise<Subscription | null> {
      const { data, error } = await supabase
        .from('subscriptions')
        .update({
          ...subscriptionPatchToRow(patch),
          version: expectedVersion + 1,
        })
        .eq('id', subscriptionId)
        .eq('version', expectedVersion)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to update subscription: ${error.message}`);
      }

      return data === null ? null : mapRowToSubscription(data as SubscriptionRow);
    },

    getPayment: fetchPayment,

    async listPaymentsByVendor(vendorId: string): Promise<Payment[]> {
      const { data, error } = await supabase
        .from('subscription_payments')
        .select('*')
        .eq('vendor_id', vendorId)
        .order('created_at', { ascending: false });

      if (error !== null) {
        throw new Error(`Failed to list payments: ${error.message}`);
      }

      return ((data ?? []) as PaymentRow[]).map(mapRowToPayment);
    },

    async createPayment(payment: NewPayment): Promise<Payment> {
      const { data, error } = await supabase
        .from('subscription_payments')
        .insert({
          subscription_id: payment.subscriptionId,
          vendor_id: payment.vendorId,
          amount_cents: payment.amount,
          currency: payment.currency,
          status: payment.status,
          payment_method: payment.paymentMethod,
          transaction_id: payment.transactionId,
          payment_date: toIsoOrNull(payment.paymentDate),
          due_date: toIsoOrNull(payment.dueDate),
          billing_period_start: payment.billingPeriodStart.toISOString(),
          billing_period_end: payment.billingPeriodEnd.toISOString(),
          failure_reason: payment.failureReason,
          retry_count: payment.retryCount,
        })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to create payment: ${error.message}`);
      }

      return mapRowToPayment(data as PaymentRow);
    },

    async updatePayment(
      paymentId: string,
      patch: PaymentPatch
    ): Promise<Payment> {
      const { data, error } = await supabase
        .from('subscription_payments')
        .update(paymentPatchToRow(patch))
        .eq('id', paymentId)
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to update payment: ${error.message}`);
      }

      return mapRowToPayment(data as PaymentRow);
    },

    /**
     * Runs complete_subscription_payment(); false from the function
     * means the version check failed and nothing was written
     */
    async completePaymentAndRollPeriod(params: {
      paymentId: string;
      payment: PaymentPatch;
      subscriptionId: string;
      expectedVersion: number;
      subscription: SubscriptionPatch;
    }): Promise<BillingOutcome | null> {
      const { data, error } = await supabase.rpc(
        'complete_subscription_payment',
        {
          p_payment_id: params.paymentId,
          p_payment: paymentPatchToRow(params.payment),
          p_subscription_id: params.subscriptionId,
          p_expected_version: params.expectedVersion,
          p_subscription: subscriptionPatchToRow(params.subscription),
        }
      );

      if (error !== null) {
        throw new Error(`Failed to complete payment: ${error.message}`);
      }
      if (data !== true) {
        return null;
      }

      const [payment, subscription] = await Promise.all([
        fetchPayment(params.paymentId),
        fetchSubscription(params.subscriptionId),
      ]);
      if (payment === null || subscription === null) {
        throw new Error('Payment or subscription missing after rollover');
      }
      return { payment, subscription };
    },

    async getOrCreateUsageRecord(record: NewUsageRecord): Promise<UsageRecord> {
      const periodStart = record.periodStart.toISOString();

      const { error: upsertError } = await supabase
        .from('usage_records')
        .upsert(
          {
            subscription_id: record.subscriptionId,
            vendor_id: record.vendorId,
            feature_name: record.featureName,
            usage_count: 0,
            usage_limit: record.usageLimit,
            period_start: periodStart,
            period_end: record.periodEnd.toISOString(),
            metadata: {},
          },
          {
            onConflict: 'subscription_id,feature_name,period_start',
            ignoreDuplicates: true,
          }
        );

      if (upsertError !== null) {
        throw new Error(
          `Failed to create usage record: ${upsertError.message}`
        );
      }

      const { data, error } = await supabase
        .from('usage_records')
        .select('*')
        .eq('subscription_id', record.subscriptionId)
        .eq('feature_name', record.featureName)
        .eq('period_start', periodStart)
        .single();

      if (error !== null) {
        throw new Error(`Failed to get usage record: ${error.message}`);
      }

      return mapRowToUsageRecord(data as UsageRecordRow);
    },

    /**
     * Runs increment_usage_within_limit(): one conditional UPDATE
     */
    async incrementUsageWithinLimit(
      recordId: string,
      increment: number,
      metadata: Record<string, unknown> | null
    ): Promise<{ applied: boolean; record: UsageRecord }> {
      const { data, error } = await supabase.rpc(
        'increment_usage_within_limit',
        {
          p_record_id: recordId,
          p_increment: increment,
          p_metadata: metadata,
        }
      );

      if (error !== null) {
        throw new Error(`Failed to increment usage: ${error.message}`);
      }

      return {
        applied: data === true,
        record: await fetchUsageRecord(recordId),
      };
    },

    async listUsageRecords(
      subscriptionId: string,
      periodStart: Date
    ): Promise<UsageRecord[]> {
      const { data, error } = await supabase
        .from('usage_records')
        .select('*')
        .eq('subscription_id', subscriptionId)
        .eq('period_start', periodStart.toISOString());

      if (error !== null) {
        throw new Error(`Failed to list usage records: ${error.message}`);
      }

      return ((data ?? []) as UsageRecordRow[]).map(mapRowToUsageRecord);
    },
  };
}
