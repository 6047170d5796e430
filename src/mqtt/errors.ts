/**
 * MQTT Module - Error Types
 *
 * Typed error unions for the publish session.
 * Errors are values, not exceptions.
 */

export type PublishError =
  | {
      readonly type: "NOT_CONNECTED";
      readonly topic: string;
      readonly message: string;
    }
  | {
      readonly type: "PUBLISH_FAILED";
      readonly topic: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CONNECT_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CONNECT_TIMEOUT";
      readonly timeoutMs: number;
      readonly message: string;
    }
  | {
      readonly type: "CONNECT_ABORTED";
      readonly message: string;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function notConnected(topic: string): PublishError {
  return {
    type: "NOT_CONNECTED",
    topic,
    message: "Not connected to broker",
  };
}

export function publishFailed(
  topic: string,
  message: string,
  cause?: Error,
): PublishError {
  if (cause) {
    return { type: "PUBLISH_FAILED", topic, message, cause };
  }
  return { type: "PUBLISH_FAILED", topic, message };
}

export function connectFailed(message: string, cause?: Error): PublishError {
  if (cause) {
    return { type: "CONNECT_FAILED", message, cause };
  }
  return { type: "CONNECT_FAILED", message };
}

export function connectTimeout(timeoutMs: number): PublishError {
  return {
    type: "CONNECT_TIMEOUT",
    timeoutMs,
    message: `No connection to broker within ${timeoutMs}ms`,
  };
}

export function connectAborted(): PublishError {
  return {
    type: "CONNECT_ABORTED",
    message: "Shutdown requested before the broker answered",
  };
}

/**
 * Format a PublishError for logging.
 */
export function formatPublishError(error: PublishError): string {
  switch (error.type) {
    case "NOT_CONNECTED":
      return `Not connected: cannot publish to ${error.topic}`;
    case "PUBLISH_FAILED":
      return `Publish to ${error.topic} failed: ${error.message}`;
    case "CONNECT_FAILED":
      return `Connect failed: ${error.message}`;
    case "CONNECT_TIMEOUT":
      return `Connect timeout: ${error.message}`;
    case "CONNECT_ABORTED":
      return `Connect aborted: ${error.message}`;
  }
}
