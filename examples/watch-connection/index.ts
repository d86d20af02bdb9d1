/**
 * Watches one live connection: captures its `read` group once a second,
 * prints how much each counter moved and records every capture to a log.
 *
 * Usage: tsx examples/watch-connection/index.ts [cid] [log path]
 */
import {
  attachLive,
  LogWriter,
  Snapshot,
  snapshotValues,
  unwrap,
} from "../../src";

const SAMPLES = 5;
const INTERVAL_MS = 1000;

const catalogue = unwrap(attachLive());
const read = unwrap(catalogue.findGroup("read"));

const cidArg = process.argv[2];
const connection =
  cidArg === undefined
    ? unwrap(catalogue.connections())[0]
    : unwrap(catalogue.lookupConnection(Number(cidArg)));
if (!connection) {
  console.error("no connections");
  process.exit(1);
}

const writer = unwrap(LogWriter.open(process.argv[3] ?? `connection-${connection.cid}.log`, connection, read));
const previous = unwrap(Snapshot.alloc(read, connection));
const current = unwrap(Snapshot.alloc(read, connection));
unwrap(previous.capture());
unwrap(writer.write(previous));

let taken = 0;
const timer = setInterval(() => {
  unwrap(current.capture());
  unwrap(writer.write(current));

  for (const field of read.fields()) {
    const moved = unwrap(current.deltaValue(field, previous));
    if (moved !== 0 && moved !== 0n) console.log(`${field.name}: +${moved}`);
  }
  console.log(snapshotValues(current));
  unwrap(previous.copyFrom(current));

  if (++taken === SAMPLES) {
    clearInterval(timer);
    unwrap(writer.close());
    catalogue.detach();
  }
}, INTERVAL_MS);
