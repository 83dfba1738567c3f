import { GUEST_PROXY_DIR, PROXY_CONF_FILE } from '../types/gateway.types'

const PROXYCHAINS_HEADER = [
  'proxy_dns',
  'tcp_read_time_out 15000',
  'tcp_connect_time_out 8000',
  '',
  '[ProxyList]'
].join('\n')

/**
 * Bash script run inside the gateway that turns `/proxy/proxy.conf` into
 * `/etc/proxychains.conf`. Falls back to the single-proxy
 * `ACTIVE_PROTOCOL` keys when no chain is configured; VPN modes are
 * brought up by the guest image itself.
 */
export function generateApplyScript (role: string): string {
  return `#!/usr/bin/env bash
set -euo pipefail

ROLE="${role}"
CONF="${GUEST_PROXY_DIR}/${PROXY_CONF_FILE}"
OUT="/etc/proxychains.conf"

log() { echo "[apply-proxy][\${ROLE}] $*"; }

if [[ ! -f "$CONF" ]]; then
  log "Config file $CONF not found, nothing to do."
  exit 0
fi

# shellcheck disable=SC1090
. "$CONF" || {
  log "Failed to source config from $CONF."
  exit 1
}

write_header() {
  cat > "$OUT" <<EOC
# Auto-generated by apply-proxy.sh for role \${ROLE}
$1
${PROXYCHAINS_HEADER}
EOC
}

# append_proxy TYPE HOST PORT USER PASS
append_proxy() {
  if [[ -n "$4" || -n "$5" ]]; then
    echo "$1 $2 $3 $4 $5" >> "$OUT"
  else
    echo "$1 $2 $3" >> "$OUT"
  fi
}

MODE="\${GATEWAY_MODE:-}"
if [[ "$MODE" = "PROXY_CHAIN" ]]; then
  COUNT="\${PROXY_COUNT:-0}"
  if ! [[ "$COUNT" =~ ^[0-9]+$ ]] || [[ "$COUNT" -lt 1 ]]; then
    log "PROXY_CHAIN mode but PROXY_COUNT is invalid ('$COUNT')."
    exit 0
  fi

  write_header "\${CHAIN_STRATEGY:-strict_chain}"

  any=0
  for ((i=1; i<=COUNT; i++)); do
    T=""; H=""; P=""; U=""; PW=""
    eval "T=\\"\\\${PROXY_\${i}_TYPE:-}\\""
    eval "H=\\"\\\${PROXY_\${i}_HOST:-}\\""
    eval "P=\\"\\\${PROXY_\${i}_PORT:-}\\""
    eval "U=\\"\\\${PROXY_\${i}_USER:-}\\""
    eval "PW=\\"\\\${PROXY_\${i}_PASS:-}\\""

    if [[ -z "$T" || -z "$H" || -z "$P" ]]; then
      log "Proxy $i incomplete (type/host/port missing), skipping."
      continue
    fi

    case "$T" in
      SOCKS5|socks5) append_proxy socks5 "$H" "$P" "$U" "$PW"; any=1 ;;
      HTTP|http) append_proxy http "$H" "$P" "$U" "$PW"; any=1 ;;
      *) log "Proxy $i has unsupported type '$T', skipping." ;;
    esac
  done

  if [[ "$any" -eq 0 ]]; then
    log "No valid proxies found in chain."
    exit 0
  fi

  log "proxychains.conf updated for PROXY_CHAIN (count=$COUNT)."
  exit 0
fi

case "\${ACTIVE_PROTOCOL:-}" in
  SOCKS5)
    if [[ -z "\${SOCKS5_HOST:-}" || -z "\${SOCKS5_PORT:-}" ]]; then
      log "SOCKS5 selected but SOCKS5_HOST or SOCKS5_PORT is empty."
      exit 0
    fi
    write_header strict_chain
    append_proxy socks5 "\${SOCKS5_HOST}" "\${SOCKS5_PORT}" "\${SOCKS5_USER:-}" "\${SOCKS5_PASS:-}"
    log "proxychains.conf updated for single SOCKS5."
    ;;
  HTTP)
    if [[ -z "\${HTTP_HOST:-}" || -z "\${HTTP_PORT:-}" ]]; then
      log "HTTP selected but HTTP_HOST or HTTP_PORT is empty."
      exit 0
    fi
    write_header strict_chain
    append_proxy http "\${HTTP_HOST}" "\${HTTP_PORT}" "\${HTTP_USER:-}" "\${HTTP_PASS:-}"
    log "proxychains.conf updated for single HTTP."
    ;;
  *)
    log "GATEWAY_MODE='\${MODE}', nothing to do in apply-proxy.sh."
    ;;
esac

exit 0
`
}
