/**
 * Subscriber Port
 *
 * One live observer of the monitoring stream.
 */

/**
 * ISubscriberConnection - a duplex byte stream owned by the monitor hub
 * from acceptance until its first failed write.
 */
export interface ISubscriberConnection {
  /** Connection identifier for logging */
  readonly id: string;

  /**
   * Write one newline-terminated line. Rejects when the peer is gone.
   */
  write(line: string): Promise<void>;

  /**
   * Close the connection. Safe to call more than once.
   */
  close(): void;
}
