/**
 * Two channels on loopback: A sends "ping" to B, B answers "pong" to A.
 *
 *   npm run example
 */
import { Channel, createStderrLogger, type ReceiveResult, textCodec } from "@tcp-channel/channel";

const PORT_A = 12345;
const PORT_B = 12346;

/**
 * Start a receive and wait until it is bound, so the peer never races the listen.
 */
function listening<T>(channel: Channel<T>): Promise<{ result: Promise<ReceiveResult<T>> }> {
  return new Promise((resolve, reject) => {
    const result = channel.receive(0, { onListening: () => resolve({ result }) });
    result.catch(reject);
  });
}

async function main(): Promise<void> {
  const a = new Channel(textCodec, {
    port: PORT_A,
    history: true,
    logger: createStderrLogger({ prefix: "[a]" })
  });
  const b = new Channel(textCodec, {
    port: PORT_B,
    history: true,
    logger: createStderrLogger({ prefix: "[b]" })
  });

  const request = await listening(b);
  await a.send("ping", PORT_B, { host: "127.0.0.1", attempts: 3, delayMs: 100 });
  const ping = await request.result;
  console.log(`b received: ${ping.status === "received" ? ping.message : ping.status}`);

  const reply = await listening(a);
  await b.send("pong", PORT_A, { host: "127.0.0.1", attempts: 3, delayMs: 100 });
  const pong = await reply.result;
  console.log(`a received: ${pong.status === "received" ? pong.message : pong.status}`);

  console.log("a history:", a.history?.entries());
  console.log("b history:", b.history?.entries());
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
