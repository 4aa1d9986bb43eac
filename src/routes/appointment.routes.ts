/**
 * Appointment Routes
 *
 * POST /api/consultas                 - Schedule
 * GET  /api/consultas                 - List (filters + pagination)
 * GET  /api/consultas/:id             - Read with patient, provider and note
 * PUT  /api/consultas/:id/status      - Change status
 * POST /api/consultas/:id/prontuario  - Record the visit note
 * PUT  /api/prontuarios/:id           - Edit a visit note
 */

import { Router, Response, NextFunction } from 'express';
import { AuthenticatedRequest } from '../types';
import { withTransaction } from '../models/db';
import * as appointmentService from '../services/appointment.service';
import { requireAuth } from '../middleware/auth.middleware';
import { NotFoundError } from '../utils/errors.utils';
import { parseIdParam, requireBody } from '../utils/validation.utils';

const router = Router();

router.use(['/consultas', '/prontuarios'], requireAuth);

function appointmentId(req: AuthenticatedRequest): number {
  return parseIdParam(req.params.id, new NotFoundError('Appointment not found', 'APPOINTMENT_NOT_FOUND'));
}

router.post('/consultas', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const body = requireBody(req.body);
    const consulta = await withTransaction((tx) => appointmentService.scheduleAppointment(tx, body));

    res.status(201).json({
      success: true,
      message: 'Appointment scheduled',
      data: { consulta },
    });
  } catch (error) {
    next(error);
  }
});

router.get('/consultas', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const page = await withTransaction((tx) =>
      appointmentService.listAppointments(tx, {
        page: req.query.page,
        per_page: req.query.per_page,
        paciente_id: req.query.paciente_id,
        medico_id: req.query.medico_id,
        status: req.query.status,
        data_inicio: req.query.data_inicio,
        data_fim: req.query.data_fim,
      })
    );

    res.status(200).json({
      success: true,
      data: { consultas: page.items, pagination: page.pagination },
    });
  } catch (error) {
    next(error);
  }
});

router.get('/consultas/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const id = appointmentId(req);
    const consulta = await withTransaction((tx) => appointmentService.getAppointment(tx, id));

    res.status(200).json({
      success: true,
      data: { consulta },
    });
  } catch (error) {
    next(error);
  }
});

router.put('/consultas/:id/status', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const id = appointmentId(req);
    const body = requireBody(req.body);
    const consulta = await withTransaction((tx) => appointmentService.updateAppointmentStatus(tx, id, body));

    res.status(200).json({
      success: true,
      message: 'Appointment status updated',
      data: { consulta },
    });
  } catch (error) {
    next(error);
  }
});

router.post('/consultas/:id/prontuario', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const id = appointmentId(req);
    const body = requireBody(req.body);
    const prontuario = await withTransaction((tx) => appointmentService.createVisitNote(tx, id, body));

    res.status(201).json({
      success: true,
      message: 'Visit note recorded',
      data: { prontuario },
    });
  } catch (error) {
    next(error);
  }
});

router.put('/prontuarios/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const id = parseIdParam(req.params.id, new NotFoundError('Visit note not found', 'NOTE_NOT_FOUND'));
    const body = requireBody(req.body);
    const prontuario = await withTransaction((tx) => appointmentService.updateVisitNote(tx, id, body));

    res.status(200).json({
      success: true,
      message: 'Visit note updated',
      data: { prontuario },
    });
  } catch (error) {
    next(error);
  }
});

export default router;
