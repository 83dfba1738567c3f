/**
 * NetworkManager tests
 *
 * Role network creation and teardown through a simulated virsh, including
 * the undo of partial creation and idempotent teardown.
 */

import fs from 'fs/promises'
import { FakeToolchain } from './helpers/FakeToolchain'
import { makeTempDir } from './helpers/testEnvironment'
import { NetworkManager, networkXml, parseNetworkInfo } from '../src/network/NetworkManager'
import { ProvisionErrorCode } from '../src/types/errors.types'
import { NetworkState } from '../src/types/network.types'

describe('NetworkManager', () => {
  let fake: FakeToolchain
  let tmpDir: string
  let networks: NetworkManager

  beforeEach(async () => {
    fake = new FakeToolchain()
    tmpDir = await makeTempDir()
    networks = new NetworkManager(fake, 'virsh', tmpDir)
  })

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true })
  })

  describe('ensureRoleNetwork', () => {
    it('defines, autostarts and starts a missing network', async () => {
      await expect(networks.ensureRoleNetwork('work')).resolves.toBe(true)

      expect(fake.calls).toEqual([
        'virsh net-info work-inet',
        `virsh net-define ${tmpDir}/net-work-inet.xml`,
        'virsh net-autostart work-inet',
        'virsh net-start work-inet'
      ])
      expect(fake.networks.get('work-inet')).toMatchObject({ active: true, autostart: true })
    })

    it('removes the temporary XML file', async () => {
      await networks.ensureRoleNetwork('work')
      await expect(fs.readdir(tmpDir)).resolves.toEqual([])
    })

    it('leaves an existing network untouched', async () => {
      fake.addNetwork('work-inet')

      await expect(networks.ensureRoleNetwork('work')).resolves.toBe(false)
      expect(fake.calls).toEqual(['virsh net-info work-inet'])
    })

    it('undefines the network when autostart fails', async () => {
      fake.failOn(/^virsh net-autostart/, 'error: cannot set autostart')

      await expect(networks.ensureRoleNetwork('work')).rejects.toMatchObject({
        code: ProvisionErrorCode.TOOL_INVOCATION_FAILED,
        message: "Failed to set autostart for network 'work-inet': error: cannot set autostart"
      })
      expect(fake.calls.slice(-1)).toEqual(['virsh net-undefine work-inet'])
      expect(fake.networks.has('work-inet')).toBe(false)
    })

    it('destroys and undefines the network when start fails', async () => {
      fake.failOn(/^virsh net-start/, 'error: bridge in use')

      await expect(networks.ensureRoleNetwork('work')).rejects.toMatchObject({
        message: "Failed to start network 'work-inet': error: bridge in use"
      })
      expect(fake.calls.slice(-2)).toEqual(['virsh net-destroy work-inet', 'virsh net-undefine work-inet'])
      expect(fake.networks.has('work-inet')).toBe(false)
    })

    it('reports a failed define with stderr', async () => {
      fake.failOn(/^virsh net-define/, 'error: XML error')

      await expect(networks.ensureRoleNetwork('work')).rejects.toMatchObject({
        message: "Failed to define network 'work-inet': error: XML error",
        context: { stderr: 'error: XML error' }
      })
    })
  })

  describe('ensureLanNetExists', () => {
    it('passes when the network is defined', async () => {
      fake.addNetwork('lan-net')
      await expect(networks.ensureLanNetExists('lan-net')).resolves.toBeUndefined()
    })

    it('fails with PRECONDITION_FAILED and never creates it', async () => {
      await expect(networks.ensureLanNetExists('lan-net')).rejects.toMatchObject({
        code: ProvisionErrorCode.PRECONDITION_FAILED,
        resource: 'lan-net'
      })
      expect(fake.callsStartingWith('virsh net-define')).toEqual([])
    })
  })

  describe('destroyNetwork', () => {
    it('stops and undefines an active network', async () => {
      fake.addNetwork('work-inet')

      await networks.destroyNetwork('work-inet')
      expect(fake.calls).toEqual(['virsh net-destroy work-inet', 'virsh net-undefine work-inet'])
      expect(fake.networks.has('work-inet')).toBe(false)
    })

    it('undefines an inactive network', async () => {
      fake.addNetwork('work-inet', false)

      await networks.destroyNetwork('work-inet')
      expect(fake.networks.has('work-inet')).toBe(false)
    })

    it('is idempotent', async () => {
      await expect(networks.destroyNetwork('work-inet')).resolves.toBeUndefined()
      await expect(networks.destroyNetwork('work-inet')).resolves.toBeUndefined()
    })

    it('fails on other undefine errors', async () => {
      fake.addNetwork('work-inet')
      fake.failOn(/^virsh net-undefine/, 'error: permission denied')

      await expect(networks.destroyNetwork('work-inet')).rejects.toMatchObject({
        code: ProvisionErrorCode.TOOL_INVOCATION_FAILED
      })
    })
  })

  describe('getInfo', () => {
    it('parses net-info output', async () => {
      fake.addNetwork('work-inet', false)

      await expect(networks.getInfo('work-inet')).resolves.toEqual({
        name: 'work-inet',
        state: NetworkState.INACTIVE,
        autostart: true,
        bridge: 'virbr1'
      })
    })

    it('returns null for unknown networks', async () => {
      await expect(networks.getInfo('nope')).resolves.toBeNull()
    })
  })
})

describe('parseNetworkInfo', () => {
  it('defaults to UNKNOWN when no Active line is present', () => {
    expect(parseNetworkInfo('x', 'garbage')).toEqual({ name: 'x', state: NetworkState.UNKNOWN, autostart: false })
  })
})

describe('networkXml', () => {
  it('describes an isolated bridge network', () => {
    expect(networkXml('work-inet')).toBe("<network>\n  <name>work-inet</name>\n  <bridge stp='on' delay='0'/>\n</network>")
  })
})
