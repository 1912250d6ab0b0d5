// irc-framework ships no type declarations and has no @types package.
// Only the surface used by src/irc/ is declared.
declare module 'irc-framework' {
  namespace IRC {
    type MessageTags = Record<string, string | true>;

    interface ParsedLine {
      tags: MessageTags;
      prefix: string;
      nick: string;
      ident: string;
      hostname: string;
      command: string;
      params: string[];
    }

    interface ConnectOptions {
      host: string;
      port: number;
      tls?: boolean;
      nick: string;
      username?: string;
      gecos?: string;
      auto_reconnect?: boolean;
      enable_echomessage?: boolean;
      [option: string]: unknown;
    }

    interface RawEvent {
      line: string;
      from_server: boolean;
    }

    class Message {
      constructor(command: string, ...params: string[]);
      tags: Record<string, string>;
      command: string;
      params: string[];
      to1459(): string;
    }

    class Client {
      constructor(options?: Record<string, unknown>);
      user: { nick: string };
      network: { cap: { isEnabled(cap: string): boolean } };
      connected: boolean;
      connect(options?: ConnectOptions): void;
      requestCap(caps: string | string[]): void;
      raw(line: string): void;
      quit(message?: string): void;
      on(event: 'raw', listener: (event: RawEvent) => void): this;
      on(event: 'socket connected' | 'close' | 'socket close', listener: () => void): this;
      on(event: 'socket error', listener: (err: Error) => void): this;
      on(event: string, listener: (...args: unknown[]) => void): this;
      removeAllListeners(event?: string): this;
    }

    function ircLineParser(line: string): ParsedLine | undefined;
  }

  export = IRC;
}
