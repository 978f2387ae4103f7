import { describe, expect, it } from 'vitest'
import {
  isAdmin,
  isDataAdmin,
  isOpsAdmin,
  isSecurityAdmin,
  parseActiveUser,
} from '../../../../src/domains/users/active-user.ts'
import { makeActiveUserDTO } from '../../../helpers/index.ts'

describe('parseActiveUser', () => {
  it('maps known properties and keeps the rest as extensions', () => {
    const user = parseActiveUser({
      '@odata.context': '$metadata#ActiveUser',
      Name: 'admin',
      FriendlyName: 'Admin',
      Type: ' Admin ',
      Enabled: true,
      Groups: [{ Name: 'ADMIN' }, { Name: 'Everyone' }, { Id: 1 }],
      IsDataAdmin: true,
      Department: 'Finance',
    })

    expect(user).toEqual({
      name: 'admin',
      friendlyName: 'Admin',
      type: 'Admin',
      enabled: true,
      groups: ['ADMIN', 'Everyone'],
      isDataAdmin: true,
      isOpsAdmin: false,
      isSecurityAdmin: false,
      extensions: { Department: 'Finance' },
    })
  })

  it('tolerates missing properties', () => {
    expect(parseActiveUser({})).toMatchObject({ name: '', type: '', groups: [] })
  })
})

describe('privilege checks', () => {
  it('grants every role to admins, case-insensitively', () => {
    const user = parseActiveUser(makeActiveUserDTO({ Type: 'admin' }))
    expect([isAdmin(user), isDataAdmin(user), isOpsAdmin(user), isSecurityAdmin(user)]).toEqual([
      true,
      true,
      true,
      true,
    ])
  })

  it('grants only the matching role to role types', () => {
    const dataAdmin = parseActiveUser(makeActiveUserDTO({ Type: 'DataAdmin' }))
    expect([isAdmin(dataAdmin), isDataAdmin(dataAdmin), isOpsAdmin(dataAdmin)]).toEqual([
      false,
      true,
      false,
    ])

    const opsAdmin = parseActiveUser(makeActiveUserDTO({ Type: 'OperationsAdmin' }))
    expect([isOpsAdmin(opsAdmin), isSecurityAdmin(opsAdmin)]).toEqual([true, false])
  })

  it('honours the explicit flags of plain users', () => {
    const user = parseActiveUser(makeActiveUserDTO({ Type: 'User', IsSecurityAdmin: true }))
    expect([isAdmin(user), isSecurityAdmin(user), isDataAdmin(user)]).toEqual([false, true, false])
  })
})
