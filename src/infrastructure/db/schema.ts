import { pgTable, text, integer, boolean, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the task record store.
 *
 * Tables are written by the task runner and only read here. Time columns
 * hold epoch seconds.
 */
export const runs = pgTable('runs', {
  run_id: text('run_id').primaryKey(),
  created: integer('created').notNull(),
  maximum: integer('maximum').notNull(),
  completed: integer('completed').notNull(),
  failed: integer('failed').notNull(),
  taskname: text('taskname'),
  launch_time: integer('launch_time'),
  sandbox: boolean('sandbox'),
});

export const hits = pgTable('hits', {
  hit_id: text('hit_id').primaryKey(),
  expiration: integer('expiration').notNull(),
  hit_status: text('hit_status'),
  assignments_pending: integer('assignments_pending'),
  assignments_available: integer('assignments_available'),
  assignments_complete: integer('assignments_complete'),
  run_id: text('run_id'),
}, (table) => [
  index('idx_hits_run_id').on(table.run_id),
]);

export const assignments = pgTable('assignments', {
  assignment_id: text('assignment_id').primaryKey(),
  status: text('status'),
  approve_time: integer('approve_time'),
  worker_id: text('worker_id'),
  hit_id: text('hit_id'),
}, (table) => [
  index('idx_assignments_worker_id').on(table.worker_id),
  index('idx_assignments_hit_id').on(table.hit_id),
]);

export const workers = pgTable('workers', {
  worker_id: text('worker_id').primaryKey(),
  accepted: integer('accepted').notNull(),
  disconnected: integer('disconnected').notNull(),
  expired: integer('expired').notNull(),
  completed: integer('completed').notNull(),
  approved: integer('approved').notNull(),
  rejected: integer('rejected').notNull(),
});

/**
 * One row per world/session an assignment took part in. `assignment_id`
 * references `assignments` by convention only: the two tables are written
 * by different parts of the runner and may briefly disagree.
 */
export const pairings = pgTable('pairings', {
  status: text('status').notNull(),
  onboarding_start: integer('onboarding_start'),
  onboarding_end: integer('onboarding_end'),
  task_start: integer('task_start'),
  task_end: integer('task_end'),
  conversation_id: text('conversation_id'),
  bonus_amount: integer('bonus_amount'),
  bonus_text: text('bonus_text'),
  bonus_paid: boolean('bonus_paid'),
  notes: text('notes'),
  onboarding_id: text('onboarding_id'),
  worker_id: text('worker_id'),
  assignment_id: text('assignment_id').notNull(),
  run_id: text('run_id'),
}, (table) => [
  index('idx_pairings_assignment_id').on(table.assignment_id),
  index('idx_pairings_worker_id').on(table.worker_id),
  index('idx_pairings_run_id').on(table.run_id),
]);
