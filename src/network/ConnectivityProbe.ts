import dns from 'dns'
import net from 'net'
import { Debugger, errorMessage } from '../utils/debug'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import { DEFAULT_CONNECT_TIMEOUT_MS } from '../types/config.types'
import { TcpProbeResult } from '../types/network.types'

/**
 * ConnectivityProbe checks that a proxy hop accepts TCP connections before
 * it is written into a gateway config. It is a pre-flight check, not a
 * health monitor: every call opens and immediately closes one socket.
 */
export class ConnectivityProbe {
  private debug: Debugger
  private timeoutMs: number

  constructor (timeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs
    this.debug = new Debugger('probe')
  }

  /**
   * Resolves every address of `host` and tries them in order until one
   * accepts a connection.
   * @throws ProvisionError CONNECTION_FAILED with the reason in the message
   */
  async testTcpConnection (host: string, port: number, timeoutMs: number = this.timeoutMs): Promise<TcpProbeResult> {
    const target = `${host}:${port}`
    let addresses: dns.LookupAddress[]
    try {
      addresses = await dns.promises.lookup(host, { all: true })
    } catch (error) {
      throw connectionFailed(host, port, `DNS resolution failed: ${errorMessage(error)}`)
    }

    if (addresses.length === 0) {
      throw connectionFailed(host, port, 'No addresses resolved')
    }

    for (const { address } of addresses) {
      const started = Date.now()
      try {
        await connectOnce(address, port, timeoutMs)
        const latencyMs = Date.now() - started
        this.debug.log(`Connected to ${target} via ${address} in ${latencyMs}ms`)
        return { host, port, address, latencyMs }
      } catch (error) {
        this.debug.log('warn', `Connection to ${address}:${port} failed: ${errorMessage(error)}`)
      }
    }

    throw connectionFailed(host, port, 'Connection timed out or refused')
  }
}

function connectOnce (address: string, port: number, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: address, port })
    socket.setTimeout(timeoutMs)

    socket.once('connect', () => {
      socket.destroy()
      resolve()
    })
    socket.once('timeout', () => {
      socket.destroy()
      reject(new Error(`timed out after ${timeoutMs}ms`))
    })
    socket.once('error', (error) => {
      socket.destroy()
      reject(error)
    })
  })
}

function connectionFailed (host: string, port: number, reason: string): ProvisionError {
  return new ProvisionError(
    ProvisionErrorCode.CONNECTION_FAILED,
    `Connection test to ${host}:${port} failed: ${reason}`,
    `${host}:${port}`,
    { host, port, reason }
  )
}
