import { chmod, mkdir, writeFile } from "fs/promises";
import path from "path";

export const MISSING_IMAGE = "missing/image:latest";

/**
 * A stand-in for `podman`/`docker`: `run` execs the command in place (so the client pid is
 * the "container"), `inspect`, `stop` and `kill` act on the pid recorded under `state/`.
 */
const SCRIPT = `#!/bin/sh
STATE="__STATE__"
while [ "$1" = "--config" ]; do echo "$2" > "$STATE/last.config"; shift 2; done
cmd="$1"; shift
case "$cmd" in
  run)
    name=""
    while [ "$#" -gt 0 ]; do
      case "$1" in
        --rm) shift ;;
        --name) name="$2"; shift 2 ;;
        --authfile) cp "$2" "$STATE/$name.auth"; echo "$2" > "$STATE/$name.authpath"; shift 2 ;;
        --workdir) cd "$2" 2>/dev/null; shift 2 ;;
        --env) export "$2"; shift 2 ;;
        --volume) echo "$2" >> "$STATE/$name.volumes"; shift 2 ;;
        --*) shift ;;
        *) break ;;
      esac
    done
    image="$1"; shift
    if [ "$image" = "${MISSING_IMAGE}" ]; then
      echo "Error: unable to find image '$image': manifest unknown" >&2
      exit 125
    fi
    echo "$image" > "$STATE/$name.image"
    echo $$ > "$STATE/$name.pid"
    exec "$@"
    ;;
  inspect)
    name="$3"
    if [ -f "$STATE/$name.pid" ]; then
      if kill -0 "$(cat "$STATE/$name.pid")" 2>/dev/null; then echo true; else echo false; fi
      exit 0
    fi
    echo "Error: no such container $name" >&2
    exit 125
    ;;
  stop)
    name="$3"
    if [ ! -f "$STATE/$name.pid" ]; then
      echo "Error: no such container $name" >&2
      exit 125
    fi
    echo "$2" > "$STATE/$name.stop_time"
    kill -TERM "$(cat "$STATE/$name.pid")" 2>/dev/null
    rm -f "$STATE/$name.pid"
    exit 0
    ;;
  kill)
    name="$1"
    if [ ! -f "$STATE/$name.pid" ]; then
      echo "Error: no such container $name" >&2
      exit 125
    fi
    kill -KILL "$(cat "$STATE/$name.pid")" 2>/dev/null
    rm -f "$STATE/$name.pid"
    exit 0
    ;;
esac
echo "unsupported command: $cmd" >&2
exit 125
`;

export interface FakeRuntime {
  /** Absolute path of the runtime executable. */
  runtime: string;
  stateDir: string;
}

export async function installFakeRuntime(dir: string, name = "fake-podman"): Promise<FakeRuntime> {
  const stateDir = path.join(dir, "state");
  await mkdir(stateDir, { recursive: true });
  const runtime = path.join(dir, name);
  await writeFile(runtime, SCRIPT.replace("__STATE__", stateDir));
  await chmod(runtime, 0o755);
  return { runtime, stateDir };
}

/** Passes through to the wrapped command, the way bwrap does after its own options. */
export async function installFakeSandbox(dir: string): Promise<string> {
  const exe = path.join(dir, "fake-bwrap");
  await writeFile(
    exe,
    `#!/bin/sh
while [ "$#" -gt 0 ]; do
  if [ "$1" = "--" ]; then shift; exec "$@"; fi
  shift
done
exit 127
`
  );
  await chmod(exe, 0o755);
  return exe;
}
