import { describe, expect, it } from 'vitest';
import { getContractAddress, parseEther } from 'viem';
import { Devnet } from '../src/services/chain';
import { baseConfig, bob, expectRevert, owner, T0, tokens, treasury } from './helpers';

describe('Devnet', () => {
  const clock = () => T0;

  it('derives contract addresses from the deployer nonce', () => {
    const devnet = new Devnet(clock);

    const { token, sale } = devnet.deployWhitelistSale({
      deployer: owner,
      treasury,
      token: { name: 'Sale Token', symbol: 'SALE' },
      config: baseConfig,
    });

    expect(token.address).toBe(getContractAddress({ from: owner, nonce: 0n }));
    expect(sale.address).toBe(getContractAddress({ from: owner, nonce: 1n }));
    expect(devnet.nonceOf(owner)).toBe(2);
    expect(devnet.getSale(sale.address)).toBe(sale);
    expect(devnet.getToken(token.address)).toBe(token);
  });

  it('mints the sale supply by default', () => {
    const devnet = new Devnet(clock);
    const { token, sale } = devnet.deployWhitelistSale({
      deployer: owner,
      token: { name: 'Sale Token', symbol: 'SALE' },
      config: baseConfig,
    });

    expect(token.balanceOf(sale.address)).toBe(tokens(1000));
    expect(token.totalSupply).toBe(tokens(1000));
    expect(sale.treasury).toBe(owner);
    expect(sale.owner).toBe(owner);
  });

  it('can skip funding and open claiming at the sale start', () => {
    const devnet = new Devnet(clock);
    const { token, sale } = devnet.deployWhitelistSale({
      deployer: owner,
      treasury,
      token: { name: 'Sale Token', symbol: 'SALE' },
      config: baseConfig,
      fundSale: false,
      enableClaim: true,
    });

    expect(token.totalSupply).toBe(0n);
    expect(sale.claimSettings).toEqual({ claimEnabled: true, claimStartTime: baseConfig.startTime });
  });

  it('rejects a sale for a token that was never deployed', () => {
    const devnet = new Devnet(clock);

    expectRevert(() => devnet.deploySale(owner, { token: bob, treasury, config: baseConfig }), 'UnknownToken');
  });

  it('moves time forward only', () => {
    const devnet = new Devnet(clock);

    expect(devnet.increaseTime(3600)).toBe(T0 + 3600);
    expect(devnet.now()).toBe(T0 + 3600);
    expect(devnet.offset).toBe(3600);
    expect(() => devnet.increaseTime(-1)).toThrow('Time can only move forward by a whole number of seconds');
    expect(() => devnet.increaseTime(1.5)).toThrow('Time can only move forward');
  });

  it('accepts initial native balances', () => {
    const devnet = new Devnet(clock);
    devnet.native.setBalance(bob, parseEther('5'));

    expect(devnet.native.balanceOf(bob)).toBe(parseEther('5'));
  });
});
