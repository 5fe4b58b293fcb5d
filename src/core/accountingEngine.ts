/**
 * Accounting Engine — Vault Operations
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ALL LEDGER MUTATIONS GO THROUGH THIS MODULE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Each public operation:
 *   1. checks the caller's role (admin / operator / position owner)
 *   2. validates inputs and preconditions on a draft of the state
 *   3. applies checked fixed-point arithmetic to the draft
 *   4. commits through VaultStore.transact(), which asserts invariants
 *   5. publishes the buffered events only after the commit
 *
 * A thrown VaultError at any step leaves no observable effect.
 *
 * ROLES:
 *   admin    → initialize, pause/unpause, fee recipient, fee sweep
 *   operator → deploy, return, valuation reports
 *   owner    → deposit / withdraw on their own position
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    assertWithinDeploymentLimit,
    computeDeploymentRatioBps,
    computeMaxDeployable,
    computePrincipalReturned,
} from '../capital/deployment';
import { computePerformanceFee, isValidFeeBps } from '../capital/fees';
import {
    computeNavPerShare,
    computePoolValue,
    computeRedemptionPayout,
    computeSharesToBurn,
    computeSharesToMint,
} from '../capital/shareLedger';
import { admitValuation, isValuationStale, VALUATION_CONFIG } from '../capital/valuationGate';
import { VaultStore, VaultTransaction } from '../state/vaultStore';
import { EventSink, VaultEventBus } from '../telemetry/vaultEvents';
import {
    Clock,
    DepositResult,
    Identity,
    InitializeProtocolParams,
    ProtocolConfig,
    ProtocolStats,
    ReturnCapitalResult,
    systemClock,
    UserBalance,
    UserPosition,
    UserStats,
    ValuationReport,
    WithdrawResult,
} from '../types';
import logger from '../utils/logger';
import { assertU64, checkedAdd, checkedSub, formatAmount, saturatingSub } from '../utils/math';
import { ensure, VaultError } from './errors';

const LOG_PREFIX = '[VAULT]';

function shortId(identity: Identity): string {
    return identity.length > 8 ? `${identity.slice(0, 8)}...` : identity;
}

export interface AccountingEngineOptions {
    store?: VaultStore;
    clock?: Clock;
    sink?: EventSink;
}

export class AccountingEngine {
    readonly store: VaultStore;
    private readonly clock: Clock;
    private readonly sink: EventSink;

    constructor(options: AccountingEngineOptions = {}) {
        this.store = options.store ?? new VaultStore();
        this.clock = options.clock ?? systemClock;
        this.sink = options.sink ?? new VaultEventBus();
    }

    private commit<T>(operation: (tx: VaultTransaction) => T): T {
        const { result, events } = this.store.transact(this.clock(), operation);
        this.sink.publish(events);
        return result;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CONFIG STORE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Create the protocol singleton. Only the designated admin may call it, once.
     */
    initializeProtocol(caller: Identity, params: InitializeProtocolParams): ProtocolConfig {
        return this.commit(tx => {
            ensure(tx.draft.config === null, 'AlreadyInitialized', 'protocol is already initialized');
            ensure(caller === params.admin, 'Unauthorized', 'only the admin may initialize the protocol', {
                caller,
            });
            ensure(isValidFeeBps(params.performanceFeeBps), 'InvalidFeeBps', 'performance fee must be 0-10000 bps', {
                performanceFeeBps: params.performanceFeeBps,
            });

            const config: ProtocolConfig = {
                admin: params.admin,
                operator: params.operator,
                feeRecipient: params.feeRecipient ?? params.admin,
                treasury: tx.treasury.id,
                totalShares: 0n,
                totalTradingDeployed: 0n,
                accumulatedFees: 0n,
                performanceFeeBps: params.performanceFeeBps,
                isPaused: false,
                lastFeeSweep: 0,
                deployedCurrentValue: 0n,
                lastValuationTimestamp: 0,
                lastDeploymentTimestamp: 0,
                pendingUnrealizedFees: 0n,
                initializedAt: tx.now,
            };
            tx.draft.config = config;
            tx.treasury.balance = 0n;

            tx.emit({
                type: 'ProtocolInitialized',
                admin: config.admin,
                operator: config.operator,
                feeRecipient: config.feeRecipient,
                performanceFeeBps: config.performanceFeeBps,
            });

            logger.info(
                `${LOG_PREFIX} initialized treasury=${config.treasury} admin=${shortId(config.admin)} ` +
                `operator=${shortId(config.operator)} feeBps=${config.performanceFeeBps}`
            );
            return { ...config };
        });
    }

    pauseProtocol(caller: Identity): void {
        this.setPaused(caller, true);
    }

    unpauseProtocol(caller: Identity): void {
        this.setPaused(caller, false);
    }

    private setPaused(caller: Identity, isPaused: boolean): void {
        this.commit(tx => {
            const config = tx.config;
            ensure(caller === config.admin, 'Unauthorized', 'only the admin may pause or unpause', { caller });
            config.isPaused = isPaused;
            tx.emit({ type: 'PauseChanged', isPaused });
            logger.warn(`${LOG_PREFIX} PAUSE isPaused=${isPaused}`);
        });
    }

    setFeeRecipient(caller: Identity, feeRecipient: Identity): void {
        this.commit(tx => {
            const config = tx.config;
            ensure(caller === config.admin, 'Unauthorized', 'only the admin may change the fee recipient', { caller });
            config.feeRecipient = feeRecipient;
            tx.emit({ type: 'FeeRecipientChanged', feeRecipient });
            logger.info(`${LOG_PREFIX} fee recipient set to ${shortId(feeRecipient)}`);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SHARE LEDGER
    // ═══════════════════════════════════════════════════════════════════════════

    createUserPosition(owner: Identity): UserPosition {
        return this.commit(tx => {
            ensure(tx.draft.config !== null, 'NotInitialized', 'protocol has not been initialized');
            ensure(!tx.getPosition(owner), 'PositionAlreadyExists', `position for ${owner} already exists`, { owner });
            return { ...this.openPosition(tx, owner) };
        });
    }

    private openPosition(tx: VaultTransaction, owner: Identity): UserPosition {
        const position: UserPosition = {
            owner,
            shares: 0n,
            depositedAmount: 0n,
            withdrawnAmount: 0n,
            createdAt: tx.now,
            lastActivityAt: tx.now,
        };
        tx.draft.positions.set(owner, position);
        tx.emit({ type: 'PositionCreated', owner });
        logger.info(`${LOG_PREFIX} position created for ${shortId(owner)}`);
        return position;
    }

    /**
     * Deposit into the treasury and mint shares at the pre-deposit NAV.
     * The position is created on first deposit.
     */
    deposit(owner: Identity, amount: bigint, minShares: bigint = 0n): DepositResult {
        return this.commit(tx => {
            const config = tx.config;
            ensure(!config.isPaused, 'Paused', 'protocol is paused');
            ensure(amount > 0n, 'ZeroAmount', 'deposit amount must be positive');
            assertU64(amount, 'amount');

            const sharesMinted = config.totalShares === 0n
                ? amount
                : computeSharesToMint(amount, config.totalShares, computePoolValue(config, tx.treasury.balance));

            ensure(sharesMinted > 0n, 'ZeroShares', 'deposit is too small to mint a share', { amount });
            ensure(sharesMinted >= minShares, 'SlippageExceeded', 'minted fewer shares than requested', {
                sharesMinted,
                minShares,
            });

            const position = tx.getPosition(owner) ?? this.openPosition(tx, owner);

            tx.treasury.balance = checkedAdd(tx.treasury.balance, amount);
            position.shares = checkedAdd(position.shares, sharesMinted);
            position.depositedAmount = checkedAdd(position.depositedAmount, amount);
            position.lastActivityAt = tx.now;
            config.totalShares = checkedAdd(config.totalShares, sharesMinted);

            tx.emit({
                type: 'Deposit',
                user: owner,
                amount,
                sharesMinted,
                treasuryBalance: tx.treasury.balance,
                totalShares: config.totalShares,
            });

            logger.info(
                `${LOG_PREFIX} DEPOSIT user=${shortId(owner)} amount=${formatAmount(amount)} ` +
                `minted=${sharesMinted} userShares=${position.shares} treasury=${formatAmount(tx.treasury.balance)}`
            );
            return { sharesMinted, totalShares: config.totalShares };
        });
    }

    /**
     * Redeem shares for idle treasury funds. Never recalls deployed capital.
     */
    withdraw(owner: Identity, sharesToRedeem: bigint, minPayout: bigint = 0n): WithdrawResult {
        return this.commit(tx => {
            const config = tx.config;
            ensure(!config.isPaused, 'Paused', 'protocol is paused');
            ensure(sharesToRedeem > 0n, 'ZeroAmount', 'shares to redeem must be positive');

            const position = tx.requirePosition(owner);
            ensure(sharesToRedeem <= position.shares, 'InsufficientShares', 'redeeming more shares than owned', {
                sharesToRedeem,
                owned: position.shares,
            });

            const poolValue = computePoolValue(config, tx.treasury.balance);
            const payout = computeRedemptionPayout(sharesToRedeem, config.totalShares, poolValue);

            ensure(payout >= minPayout, 'SlippageExceeded', 'payout below requested minimum', { payout, minPayout });

            this.applyWithdrawal(tx, position, payout, sharesToRedeem);
            return { payout, sharesBurned: sharesToRedeem, remainingShares: position.shares };
        });
    }

    /**
     * Withdraw an exact amount, burning shares rounded up against the caller
     */
    withdrawAmount(owner: Identity, amount: bigint, maxShares?: bigint): WithdrawResult {
        return this.commit(tx => {
            const config = tx.config;
            ensure(!config.isPaused, 'Paused', 'protocol is paused');
            ensure(amount > 0n, 'ZeroAmount', 'withdraw amount must be positive');
            assertU64(amount, 'amount');

            const position = tx.requirePosition(owner);
            const poolValue = computePoolValue(config, tx.treasury.balance);
            const sharesToBurn = computeSharesToBurn(amount, config.totalShares, poolValue);

            ensure(sharesToBurn <= position.shares, 'InsufficientShares', 'amount exceeds position value', {
                sharesToBurn,
                owned: position.shares,
            });
            if (maxShares !== undefined) {
                ensure(sharesToBurn <= maxShares, 'SlippageExceeded', 'would burn more shares than allowed', {
                    sharesToBurn,
                    maxShares,
                });
            }

            this.applyWithdrawal(tx, position, amount, sharesToBurn);
            return { payout: amount, sharesBurned: sharesToBurn, remainingShares: position.shares };
        });
    }

    private applyWithdrawal(tx: VaultTransaction, position: UserPosition, payout: bigint, sharesBurned: bigint): void {
        const config = tx.config;
        ensure(payout <= tx.treasury.balance, 'InsufficientLiquidity', 'idle treasury cannot cover the payout', {
            payout,
            idle: tx.treasury.balance,
        });

        tx.treasury.balance = checkedSub(tx.treasury.balance, payout);
        position.shares = checkedSub(position.shares, sharesBurned);
        position.withdrawnAmount = checkedAdd(position.withdrawnAmount, payout);
        position.lastActivityAt = tx.now;
        config.totalShares = checkedSub(config.totalShares, sharesBurned);

        tx.emit({
            type: 'Withdraw',
            user: position.owner,
            amount: payout,
            sharesBurned,
            remainingShares: position.shares,
            treasuryBalance: tx.treasury.balance,
        });

        logger.info(
            `${LOG_PREFIX} WITHDRAW user=${shortId(position.owner)} amount=${formatAmount(payout)} ` +
            `burned=${sharesBurned} remaining=${position.shares} treasury=${formatAmount(tx.treasury.balance)}`
        );
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DEPLOYMENT LIFECYCLE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Move idle funds to the trading venue, within the 90% ceiling
     */
    deployCapitalForTrading(caller: Identity, amount: bigint): void {
        this.commit(tx => {
            const config = tx.config;
            ensure(caller === config.operator, 'Unauthorized', 'only the operator may deploy capital', { caller });
            ensure(!config.isPaused, 'Paused', 'protocol is paused');
            ensure(amount > 0n, 'ZeroAmount', 'deploy amount must be positive');
            assertU64(amount, 'amount');

            assertWithinDeploymentLimit(amount, tx.treasury.balance, config.totalTradingDeployed);

            tx.treasury.balance = checkedSub(tx.treasury.balance, amount);
            config.totalTradingDeployed = checkedAdd(config.totalTradingDeployed, amount);
            // the mark tracks principal until the next valuation report
            config.deployedCurrentValue = checkedAdd(config.deployedCurrentValue, amount);
            config.lastDeploymentTimestamp = tx.now;

            tx.emit({
                type: 'CapitalDeployed',
                amount,
                totalDeployed: config.totalTradingDeployed,
                treasuryRemaining: tx.treasury.balance,
                deployedCurrentValue: config.deployedCurrentValue,
            });

            logger.info(
                `${LOG_PREFIX} DEPLOY amount=${formatAmount(amount)} totalDeployed=${formatAmount(config.totalTradingDeployed)} ` +
                `idle=${formatAmount(tx.treasury.balance)}`
            );
        });
    }

    /**
     * Bring funds back from the venue. Principal = amountReturned - realizedPnl.
     * Positive PnL accrues the performance fee; losses carry none.
     */
    returnCapitalFromTrading(caller: Identity, amountReturned: bigint, realizedPnl: bigint): ReturnCapitalResult {
        return this.commit(tx => {
            const config = tx.config;
            ensure(caller === config.operator, 'Unauthorized', 'only the operator may return capital', { caller });
            ensure(amountReturned >= 0n, 'InvalidAmount', 'amount returned must not be negative', { amountReturned });
            assertU64(amountReturned, 'amountReturned');

            const principalReturned = computePrincipalReturned(amountReturned, realizedPnl);
            ensure(amountReturned > 0n || principalReturned > 0n, 'ZeroAmount', 'nothing returned and nothing written off');
            ensure(
                principalReturned <= config.totalTradingDeployed,
                'ReturnExceedsDeployed',
                'principal returned exceeds capital deployed',
                { principalReturned, totalTradingDeployed: config.totalTradingDeployed }
            );

            const feeAccrued = computePerformanceFee(realizedPnl, config.performanceFeeBps);

            tx.treasury.balance = checkedAdd(tx.treasury.balance, amountReturned);
            config.totalTradingDeployed = checkedSub(config.totalTradingDeployed, principalReturned);
            config.accumulatedFees = checkedAdd(config.accumulatedFees, feeAccrued);

            if (config.totalTradingDeployed === 0n) {
                config.deployedCurrentValue = 0n;
                config.pendingUnrealizedFees = 0n;
            } else {
                config.deployedCurrentValue = saturatingSub(config.deployedCurrentValue, principalReturned);
            }

            tx.emit({
                type: 'CapitalReturned',
                amount: amountReturned,
                principalReturned,
                profitOrLoss: realizedPnl,
                feeAccrued,
                totalDeployed: config.totalTradingDeployed,
                newTreasuryBalance: tx.treasury.balance,
            });

            if (realizedPnl > 0n) {
                logger.info(
                    `${LOG_PREFIX} RETURN amount=${formatAmount(amountReturned)} profit=${formatAmount(realizedPnl)} ` +
                    `fee=${formatAmount(feeAccrued)} totalDeployed=${formatAmount(config.totalTradingDeployed)}`
                );
            } else if (realizedPnl < 0n) {
                logger.warn(
                    `${LOG_PREFIX} RETURN amount=${formatAmount(amountReturned)} loss=${formatAmount(-realizedPnl)} ` +
                    `totalDeployed=${formatAmount(config.totalTradingDeployed)}`
                );
            } else {
                logger.info(
                    `${LOG_PREFIX} RETURN amount=${formatAmount(amountReturned)} flat ` +
                    `totalDeployed=${formatAmount(config.totalTradingDeployed)}`
                );
            }

            return { principalReturned, feeAccrued };
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VALUATION ORACLE GATE
    // ═══════════════════════════════════════════════════════════════════════════

    updateDeploymentValuation(caller: Identity, report: ValuationReport): void {
        this.commit(tx => {
            const config = tx.config;
            ensure(caller === config.operator, 'Unauthorized', 'only the operator may report valuations', { caller });

            const admitted = admitValuation(report, config, tx.now);
            config.deployedCurrentValue = admitted.deployedCurrentValue;
            config.pendingUnrealizedFees = admitted.pendingUnrealizedFees;
            config.lastValuationTimestamp = admitted.timestamp;

            tx.emit({
                type: 'ValuationUpdated',
                deploymentId: report.deploymentId,
                totalDeployedOriginal: config.totalTradingDeployed,
                totalDeployedCurrent: admitted.deployedCurrentValue,
                orcaValue: report.orcaPositionsValue,
                driftValue: report.driftEquityValue,
                uncollectedFees: report.uncollectedFees,
                unrealizedPnl: report.unrealizedPnl,
                pendingFees: admitted.pendingUnrealizedFees,
                timestamp: admitted.timestamp,
            });

            logger.info(
                `${VALUATION_CONFIG.logPrefix} VALUATION deployment=${report.deploymentId} ` +
                `original=${formatAmount(config.totalTradingDeployed)} current=${formatAmount(admitted.deployedCurrentValue)} ` +
                `pendingFees=${formatAmount(admitted.pendingUnrealizedFees)} ts=${admitted.timestamp}`
            );
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // FEE SWEEP
    // ═══════════════════════════════════════════════════════════════════════════

    sweepFees(caller: Identity): bigint {
        return this.commit(tx => {
            const config = tx.config;
            ensure(caller === config.admin, 'Unauthorized', 'only the admin may sweep fees', { caller });

            const amount = config.accumulatedFees;
            ensure(amount > 0n, 'NothingToSweep', 'no accumulated fees');
            ensure(amount <= tx.treasury.balance, 'InsufficientLiquidity', 'idle treasury cannot cover the fees', {
                accumulatedFees: amount,
                idle: tx.treasury.balance,
            });

            tx.treasury.balance = checkedSub(tx.treasury.balance, amount);
            config.accumulatedFees = 0n;
            config.lastFeeSweep = tx.now;

            tx.emit({ type: 'FeesSwept', amount, recipient: config.feeRecipient });
            logger.info(`${LOG_PREFIX} SWEEP amount=${formatAmount(amount)} recipient=${shortId(config.feeRecipient)}`);
            return amount;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // READ-ONLY VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    private requireConfig(): Readonly<ProtocolConfig> {
        const config = this.store.getConfig();
        if (!config) {
            throw new VaultError('NotInitialized', 'protocol has not been initialized');
        }
        return config;
    }

    private requirePosition(owner: Identity): Readonly<UserPosition> {
        const position = this.store.getPosition(owner);
        if (!position) {
            throw new VaultError('PositionNotFound', `no position for ${owner}`, { owner });
        }
        return position;
    }

    /**
     * Current value of a position; flags a stale mark without failing
     */
    calculateUserBalance(owner: Identity): UserBalance {
        const config = this.requireConfig();
        const position = this.requirePosition(owner);
        if (config.totalShares === 0n) {
            throw new VaultError('UndefinedNav', 'NAV is undefined while no shares are outstanding');
        }

        const poolValue = computePoolValue(config, this.store.getTreasuryBalance());
        const now = this.clock();
        const stale = isValuationStale(config, now);
        if (stale) {
            logger.warn(
                `${VALUATION_CONFIG.logPrefix} StaleValuation last=${config.lastValuationTimestamp} now=${now}`
            );
        }

        return {
            balance: computeRedemptionPayout(position.shares, config.totalShares, poolValue),
            stale,
        };
    }

    getProtocolStats(): ProtocolStats {
        const config = this.requireConfig();
        const idleBalance = this.store.getTreasuryBalance();
        const tvl = computePoolValue(config, idleBalance);

        return {
            tvl,
            idleBalance,
            totalTradingDeployed: config.totalTradingDeployed,
            deployedCurrentValue: config.deployedCurrentValue,
            accumulatedFees: config.accumulatedFees,
            pendingUnrealizedFees: config.pendingUnrealizedFees,
            totalShares: config.totalShares,
            navPerShare: computeNavPerShare(config.totalShares, tvl),
            maxDeployable: computeMaxDeployable(idleBalance, config.totalTradingDeployed),
            deploymentRatioBps: computeDeploymentRatioBps(idleBalance, config.totalTradingDeployed),
            isPaused: config.isPaused,
            lastValuationTimestamp: config.lastValuationTimestamp,
            valuationStale: isValuationStale(config, this.clock()),
        };
    }

    getUserStats(owner: Identity): UserStats {
        const config = this.requireConfig();
        const position = this.requirePosition(owner);

        let balance = 0n;
        if (config.totalShares > 0n && position.shares > 0n) {
            const poolValue = computePoolValue(config, this.store.getTreasuryBalance());
            balance = computeRedemptionPayout(position.shares, config.totalShares, poolValue);
        }

        return {
            owner,
            shares: position.shares,
            balance,
            depositedAmount: position.depositedAmount,
            withdrawnAmount: position.withdrawnAmount,
            stale: isValuationStale(config, this.clock()),
        };
    }
}
