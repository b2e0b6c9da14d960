import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiParam, ApiProperty, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RegistrationsService } from './registrations.service';
import { PaymentsService } from './payments.service';
import { Registration } from './registration.entity';
import { PaymentMethod, PaymentRecord } from './payment-record.entity';
import { validateSyrianPhone } from '../common/phone';
import { checkFullName } from '../students/profile-validation';
import { API_KEY_HEADER, ApiKeyGuard } from '../common/api-key.guard';

/** Recorded as the deciding admin for actions taken through the HTTP API. */
export const HTTP_ADMIN_ID = 0;

class CreateRegistrationDto {
  @ApiProperty({ example: 123456789 })
  telegram_id!: number;

  @ApiProperty({ example: 'Sara Ahmad Khalil' })
  full_name!: string;

  @ApiProperty({ example: '0991234567' })
  phone_number!: string;

  @ApiProperty()
  course_id!: string;
}

class DecisionDto {
  @ApiProperty({ required: false, description: 'Approval note or rejection reason' })
  notes?: string;
}

class AddPaymentDto {
  @ApiProperty({ example: 50000 })
  amount!: number;

  @ApiProperty({ enum: PaymentMethod })
  payment_method!: PaymentMethod;

  @ApiProperty({ required: false })
  notes?: string;
}

const isPaymentMethod = (value: unknown): value is PaymentMethod =>
  Object.values(PaymentMethod).some(method => method === value);

function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

@ApiTags('registrations')
@ApiHeader({ name: API_KEY_HEADER, required: true })
@UseGuards(ApiKeyGuard)
@Controller('registrations')
export class RegistrationsController {
  constructor(
    private readonly registrationsService: RegistrationsService,
    private readonly paymentsService: PaymentsService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Quick registration: creates or updates the student and opens a pending request' })
  @ApiBody({ type: CreateRegistrationDto })
  @ApiResponse({ status: 201, description: 'Registration created', type: Registration })
  @ApiResponse({ status: 400, description: 'Invalid data, duplicate registration or full course' })
  async create(@Body() body: CreateRegistrationDto) {
    if (!Number.isInteger(body.telegram_id) || body.telegram_id <= 0) {
      throw new BadRequestException('telegram_id must be a positive integer');
    }
    const name = checkFullName(String(body.full_name ?? ''));
    if (!name.valid) {
      throw new BadRequestException('full_name must have at least three words of two or more letters');
    }
    const phone = validateSyrianPhone(String(body.phone_number ?? ''));
    if (!phone.valid || !phone.normalized) {
      throw new BadRequestException(phone.error);
    }
    if (typeof body.course_id !== 'string' || !body.course_id) {
      throw new BadRequestException('course_id is required');
    }

    const result = await this.registrationsService.requestRegistration(
      body.telegram_id,
      name.value,
      phone.normalized,
      body.course_id,
    );
    if (!result.success) {
      throw result.error === 'Course not found' ? new NotFoundException(result.error) : new BadRequestException(result.error);
    }
    return result.registration;
  }

  @Get('pending')
  @ApiOperation({ summary: 'Pending registrations with student and course' })
  @ApiResponse({ status: 200, description: 'Pending registrations' })
  async findPending() {
    return await this.registrationsService.getPending();
  }

  @Put(':id/approve')
  @ApiOperation({ summary: 'Approve a pending registration' })
  @ApiParam({ name: 'id', description: 'Registration id' })
  @ApiBody({ type: DecisionDto, required: false })
  @ApiResponse({ status: 200, description: 'Registration approved', type: Registration })
  @ApiResponse({ status: 400, description: 'Registration is not pending' })
  @ApiResponse({ status: 404, description: 'Registration not found' })
  async approve(@Param('id') id: string, @Body() body: DecisionDto = {}) {
    return this.decided(await this.registrationsService.approve(id, HTTP_ADMIN_ID, optionalText(body.notes)));
  }

  @Put(':id/reject')
  @ApiOperation({ summary: 'Reject a pending registration' })
  @ApiParam({ name: 'id', description: 'Registration id' })
  @ApiBody({ type: DecisionDto, required: false })
  @ApiResponse({ status: 200, description: 'Registration rejected', type: Registration })
  @ApiResponse({ status: 400, description: 'Registration is not pending' })
  @ApiResponse({ status: 404, description: 'Registration not found' })
  async reject(@Param('id') id: string, @Body() body: DecisionDto = {}) {
    return this.decided(await this.registrationsService.reject(id, HTTP_ADMIN_ID, optionalText(body.notes)));
  }

  @Post(':id/payments')
  @HttpCode(201)
  @ApiOperation({ summary: 'Record a payment for an approved registration' })
  @ApiParam({ name: 'id', description: 'Registration id' })
  @ApiBody({ type: AddPaymentDto })
  @ApiResponse({ status: 201, description: 'Payment recorded with the new totals' })
  @ApiResponse({ status: 400, description: 'Invalid amount or registration not approved' })
  @ApiResponse({ status: 404, description: 'Registration not found' })
  async addPayment(@Param('id') id: string, @Body() body: AddPaymentDto) {
    const amount = Number(body.amount);
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new BadRequestException('amount must be greater than zero');
    }
    if (!isPaymentMethod(body.payment_method)) {
      throw new BadRequestException(`payment_method must be one of: ${Object.values(PaymentMethod).join(', ')}`);
    }

    const result = await this.paymentsService.addPayment(id, amount, body.payment_method, HTTP_ADMIN_ID, optionalText(body.notes));
    if (!result.success) {
      throw result.error === 'Registration not found' ? new NotFoundException(result.error) : new BadRequestException(result.error);
    }
    return { payment: result.payment, total_paid: result.total_paid, remaining: result.remaining };
  }

  @Get(':id/payments')
  @ApiOperation({ summary: 'Payment history of a registration' })
  @ApiParam({ name: 'id', description: 'Registration id' })
  @ApiResponse({ status: 200, description: 'Payments, oldest first', type: [PaymentRecord] })
  @ApiResponse({ status: 404, description: 'Registration not found' })
  async getPayments(@Param('id') id: string) {
    if (!(await this.registrationsService.findById(id))) {
      throw new NotFoundException('Registration not found');
    }
    return await this.paymentsService.getPaymentHistory(id);
  }

  private decided(result: Awaited<ReturnType<RegistrationsService['approve']>>): Registration {
    if (!result.success) {
      throw result.error === 'Registration not found' ? new NotFoundException(result.error) : new BadRequestException(result.error);
    }
    return result.registration;
  }
}
