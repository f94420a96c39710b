/**
 * Prometheus-compatible metrics for observability
 * Provides both JSON metrics (/metrics) and Prometheus format (/metrics/prometheus)
 */
import type { FastifyPluginAsync } from "fastify";
import os from "node:os";
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import type { TutoringQueue } from "../domains/tutoring/tutoringQueue.js";
import type { ClientManager } from "../client/clientManager.js";

export const metricsRegistry = new Registry();

// Default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: metricsRegistry });

export const metrics = {
  socketConnections: new Gauge({
    name: "tutorbot_socket_connections_total",
    help: "Current number of active socket connections",
    registers: [metricsRegistry],
  }),

  eventsTotal: new Counter({
    name: "tutorbot_socket_events_total",
    help: "Total number of socket events processed",
    labelNames: ["event", "status"] as const,
    registers: [metricsRegistry],
  }),

  eventLatency: new Histogram({
    name: "tutorbot_socket_event_latency_seconds",
    help: "Socket event processing latency in seconds",
    labelNames: ["event"] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
    registers: [metricsRegistry],
  }),

  commandsTotal: new Counter({
    name: "tutorbot_commands_total",
    help: "Chat commands dispatched",
    labelNames: ["command", "status"] as const, // ok, unknown, error
    registers: [metricsRegistry],
  }),

  // Tutoring queue
  tutoringOffers: new Counter({
    name: "tutorbot_tutoring_offers_total",
    help: "Confirmation offers sent to the head of a tutoring queue",
    registers: [metricsRegistry],
  }),

  tutoringOutcomes: new Counter({
    name: "tutorbot_tutoring_outcomes_total",
    help: "How tutoring slots ended",
    labelNames: ["outcome"] as const, // confirmed, timeout, released, left, departed
    registers: [metricsRegistry],
  }),

  tutoringQueues: new Gauge({
    name: "tutorbot_tutoring_queues",
    help: "Tutoring queues currently held in memory",
    registers: [metricsRegistry],
  }),

  tutoringWaiting: new Gauge({
    name: "tutorbot_tutoring_waiting_users",
    help: "Users waiting across all tutoring queues",
    registers: [metricsRegistry],
  }),

  notificationFailures: new Counter({
    name: "tutorbot_notification_failures_total",
    help: "Outbound queue notifications that could not be delivered",
    registers: [metricsRegistry],
  }),

  // Questions
  questionAnnouncements: new Counter({
    name: "tutorbot_question_announcements_total",
    help: "Newly active questions announced in their rooms",
    labelNames: ["status"] as const, // sent, failed
    registers: [metricsRegistry],
  }),

  questionResponses: new Counter({
    name: "tutorbot_question_responses_total",
    help: "Answers stored for questions",
    labelNames: ["qtype", "late"] as const,
    registers: [metricsRegistry],
  }),

  // LMS API calls
  lmsApiCalls: new Counter({
    name: "tutorbot_lms_api_calls_total",
    help: "Total LMS API calls",
    labelNames: ["function", "status"] as const,
    registers: [metricsRegistry],
  }),

  lmsApiLatency: new Histogram({
    name: "tutorbot_lms_api_latency_seconds",
    help: "LMS API call latency in seconds",
    labelNames: ["function"] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 20],
    registers: [metricsRegistry],
  }),

  authAttempts: new Counter({
    name: "tutorbot_auth_attempts_total",
    help: "Authentication attempts",
    labelNames: ["result"] as const, // success, invalid_token, no_token, error
    registers: [metricsRegistry],
  }),
};

/**
 * Metrics Fastify routes plugin
 */
export const createMetricsRoutes = (
  tutoringQueue: TutoringQueue,
  clientManager: ClientManager,
): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get("/metrics/prometheus", async (_request, reply) => {
      updateQueueMetrics(tutoringQueue);

      reply.header("Content-Type", metricsRegistry.contentType);
      return metricsRegistry.metrics();
    });

    fastify.get("/metrics", async () => {
      const memoryUsage = process.memoryUsage();

      return {
        system: {
          uptime: process.uptime(),
          memory: {
            rss: memoryUsage.rss,
            heapTotal: memoryUsage.heapTotal,
            heapUsed: memoryUsage.heapUsed,
          },
          loadAverage: os.loadavg(),
        },
        application: {
          connectedClients: clientManager.getClientCount(),
          tutoring: tutoringQueue.getStats(),
        },
        timestamp: new Date().toISOString(),
      };
    });
  };
};

function updateQueueMetrics(tutoringQueue: TutoringQueue): void {
  const stats = tutoringQueue.getStats();
  metrics.tutoringQueues.set(stats.queues);
  metrics.tutoringWaiting.set(stats.waiting);
}
