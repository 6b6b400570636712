import type { IncomingMessage, ServerResponse } from 'node:http';

/** Node request listener shape; accepted by `http.createServer`. */
export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => void;

/** Maps a request to the key its handler is cached under. */
export type RequestClassifier = (req: IncomingMessage) => string;
