export const CURL_TRAILER_MARKER = "__NETOPS_CURL__";

// Written after the body by `curl -w`; curl expands the \n escape itself.
export const CURL_TRAILER_FORMAT = `\\n${CURL_TRAILER_MARKER}%{http_code} %{time_total} %{time_connect} %{time_namelookup} %{size_download} %{speed_download}`;

export type PingStatistics = {
  packetsTransmitted: number;
  packetsReceived: number;
  packetLossPercent: number;
  minRtt: number;
  avgRtt: number;
  maxRtt: number;
  mdevRtt: number;
};

export type TracerouteHop = {
  hop: number;
  host: string | null;
  ip: string | null;
  times: number[];
};

export type MtrHop = {
  hop: number;
  host: string;
  lossPercent: number;
  sent: number;
  last: number;
  avg: number;
  best: number;
  worst: number;
  stdev: number | null;
};

export type SocketEntry = {
  netid: string | null;
  state: string | null;
  recvQ: number;
  sendQ: number;
  localAddress: string;
  peerAddress: string;
};

export type NetstatEntry = {
  protocol: string;
  recvQ: number;
  sendQ: number;
  localAddress: string;
  foreignAddress: string;
  state: string | null;
};

export type ArpEntry = {
  hostname: string | null;
  ip: string;
  mac: string | null;
  interface: string | null;
};

export type CurlStatistics = {
  httpCode: number;
  timeTotal: number;
  timeConnect: number;
  timeNamelookup: number;
  sizeDownload: number;
  speedDownload: number;
};

const toLines = (output: string): string[] => output.split(/\r?\n/);

const toNumber = (value: string | undefined): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
};

const roundTo = (value: number, digits: number): number => Number(value.toFixed(digits));

/** Handles both the Linux (iputils) and BSD summary formats. */
export const parsePingOutput = (output: string): PingStatistics => {
  const stats: PingStatistics = {
    packetsTransmitted: 0,
    packetsReceived: 0,
    packetLossPercent: 0,
    minRtt: 0,
    avgRtt: 0,
    maxRtt: 0,
    mdevRtt: 0,
  };

  for (const line of toLines(output)) {
    const packets = /(\d+) packets transmitted, (\d+) (?:packets )?received/.exec(line);
    if (packets) {
      stats.packetsTransmitted = toNumber(packets[1]);
      stats.packetsReceived = toNumber(packets[2]);
      stats.packetLossPercent =
        stats.packetsTransmitted > 0
          ? roundTo(100 - (stats.packetsReceived / stats.packetsTransmitted) * 100, 2)
          : 0;
      continue;
    }

    const rtt = /(?:rtt|round-trip) min\/avg\/max\/(?:mdev|stddev) = ([\d.]+)\/([\d.]+)\/([\d.]+)\/([\d.]+)/.exec(line);
    if (rtt) {
      stats.minRtt = toNumber(rtt[1]);
      stats.avgRtt = toNumber(rtt[2]);
      stats.maxRtt = toNumber(rtt[3]);
      stats.mdevRtt = toNumber(rtt[4]);
    }
  }

  return stats;
};

export const parseTracerouteOutput = (output: string): TracerouteHop[] => {
  const hops: TracerouteHop[] = [];

  for (const line of toLines(output)) {
    const match = /^\s*(\d+)\s+(.*)$/.exec(line);
    if (!match) {
      continue;
    }

    const rest = match[2] ?? "";
    const host = rest.split(/\s+/).find((token) => token !== "*" && token.length > 0) ?? null;
    const ip = /\(([^)]+)\)/.exec(rest)?.[1] ?? host;
    const times = [...rest.matchAll(/([\d.]+) ms/g)].map((entry) => toNumber(entry[1]));

    hops.push({
      hop: toNumber(match[1]),
      host,
      ip,
      times,
    });
  }

  return hops;
};

export const parseMtrOutput = (output: string): MtrHop[] => {
  const hops: MtrHop[] = [];

  for (const line of toLines(output)) {
    const match =
      /^\s*(\d+)\.\|--\s+(\S+)\s+([\d.]+)%?\s+(\d+)\s+([\d.]+)\s+([\d.]+)\s+([\d.]+)\s+([\d.]+)(?:\s+([\d.]+))?/.exec(
        line
      );
    if (!match) {
      continue;
    }

    hops.push({
      hop: toNumber(match[1]),
      host: match[2] ?? "",
      lossPercent: toNumber(match[3]),
      sent: toNumber(match[4]),
      last: toNumber(match[5]),
      avg: toNumber(match[6]),
      best: toNumber(match[7]),
      worst: toNumber(match[8]),
      stdev: match[9] === undefined ? null : toNumber(match[9]),
    });
  }

  return hops;
};

/**
 * Column layout is taken from the header: `ss -tu` adds a Netid column and a
 * state filter drops the State column.
 */
export const parseSsOutput = (output: string): SocketEntry[] => {
  const lines = toLines(output).filter((line) => line.trim().length > 0);
  const header = lines[0]?.trim().split(/\s+/) ?? [];
  if (!header.includes("Recv-Q")) {
    return [];
  }

  const hasNetid = header[0] === "Netid";
  const hasState = header.includes("State");
  const entries: SocketEntry[] = [];

  for (const line of lines.slice(1)) {
    const fields = line.trim().split(/\s+/);
    const netid = hasNetid ? fields.shift() ?? null : null;
    const state = hasState ? fields.shift() ?? null : null;
    const [recvQ, sendQ, localAddress, peerAddress] = fields;

    if (localAddress === undefined) {
      continue;
    }

    entries.push({
      netid,
      state,
      recvQ: toNumber(recvQ),
      sendQ: toNumber(sendQ),
      localAddress,
      peerAddress: peerAddress ?? "",
    });
  }

  return entries;
};

export const parseNetstatOutput = (output: string): NetstatEntry[] => {
  const entries: NetstatEntry[] = [];

  for (const line of toLines(output)) {
    const fields = line.trim().split(/\s+/);
    const [protocol, recvQ, sendQ, localAddress, foreignAddress, state] = fields;

    if (!protocol || !/^(tcp|udp)/.test(protocol) || foreignAddress === undefined || localAddress === undefined) {
      continue;
    }

    entries.push({
      protocol,
      recvQ: toNumber(recvQ),
      sendQ: toNumber(sendQ),
      localAddress,
      foreignAddress,
      state: state ?? null,
    });
  }

  return entries;
};

export const parseArpOutput = (output: string): ArpEntry[] => {
  const entries: ArpEntry[] = [];

  for (const line of toLines(output)) {
    const match = /^(\S+) \(([^)]+)\) at (\S+)(?: \[\w+\])?(?: on (\S+))?/.exec(line.trim());
    if (!match?.[2]) {
      continue;
    }

    const mac = match[3] ?? "";
    entries.push({
      hostname: match[1] === "?" ? null : match[1] ?? null,
      ip: match[2],
      mac: mac.startsWith("<") || mac.startsWith("(") ? null : mac,
      interface: match[4] ?? null,
    });
  }

  return entries;
};

export const parseDigShortOutput = (output: string): string[] =>
  toLines(output)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith(";"));

export const parseCurlOutput = (stdout: string): { body: string; stats: CurlStatistics | null } => {
  const index = stdout.lastIndexOf(CURL_TRAILER_MARKER);
  if (index === -1) {
    return { body: stdout, stats: null };
  }

  const body = stdout.slice(0, index).replace(/\n$/, "");
  const fields = stdout.slice(index + CURL_TRAILER_MARKER.length).trim().split(/\s+/);

  if (fields.length < 6) {
    return { body, stats: null };
  }

  const [httpCode, timeTotal, timeConnect, timeNamelookup, sizeDownload, speedDownload] = fields.map(toNumber);

  return {
    body,
    stats: {
      httpCode: httpCode ?? 0,
      timeTotal: timeTotal ?? 0,
      timeConnect: timeConnect ?? 0,
      timeNamelookup: timeNamelookup ?? 0,
      sizeDownload: sizeDownload ?? 0,
      speedDownload: speedDownload ?? 0,
    },
  };
};
